import { ManagerRegistry } from "../../../src/registry/manager-registry.js";
import { UpdaterErrorCode } from "../../../src/shared/errors.js";
import { ScriptedManager } from "../../helpers/scripted-manager.js";

function registry(): ManagerRegistry {
  const r = new ManagerRegistry();
  r.register(new ScriptedManager("homebrew"));
  r.register(new ScriptedManager("npm"), { enabled: false });
  r.register(new ScriptedManager("gem"), { exclusions: ["rake", "rake"] });
  return r;
}

describe("ManagerRegistry", () => {
  it("keeps registration order", () => {
    expect(registry().ids()).toEqual(["homebrew", "npm", "gem"]);
  });

  it("applies defaults and stores exclusions as a set", () => {
    const r = registry();
    expect(r.get("homebrew")).toMatchObject({ enabled: true, cleanup: true, selfUpdate: true });
    expect([...r.get("gem").exclusions]).toEqual(["rake"]);
  });

  it("rejects a second registration of the same id", () => {
    const r = registry();
    expect(() => r.register(new ScriptedManager("npm"))).toThrow(expect.objectContaining({ code: UpdaterErrorCode.DUPLICATE_MANAGER }));
    expect(r.size).toBe(3);
  });

  it("raises NOT_FOUND for unknown ids", () => {
    expect(() => registry().get("apt")).toThrow(expect.objectContaining({ code: UpdaterErrorCode.NOT_FOUND }));
  });

  it("lists enabled managers separately from all", () => {
    const r = registry();
    expect(r.all().map((e) => e.manager.id)).toEqual(["homebrew", "npm", "gem"]);
    expect(r.enabled().map((e) => e.manager.id)).toEqual(["homebrew", "gem"]);
  });

  describe("select", () => {
    it("returns the enabled managers without a selection", () => {
      expect(registry().select().map((e) => e.manager.id)).toEqual(["homebrew", "gem"]);
      expect(registry().select([]).map((e) => e.manager.id)).toEqual(["homebrew", "gem"]);
    });

    it("follows registry order and includes disabled managers named explicitly", () => {
      expect(registry().select(["gem", "npm"]).map((e) => e.manager.id)).toEqual(["npm", "gem"]);
    });

    it("names every unknown id", () => {
      expect(() => registry().select(["gem", "apt", "yum"])).toThrow("Unknown manager(s): apt, yum");
    });
  });
});
