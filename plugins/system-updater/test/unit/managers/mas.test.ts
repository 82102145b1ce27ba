import { MasManager, parseMasOutdated } from "../../../src/managers/mas.js";
import { UpdaterErrorCode } from "../../../src/shared/errors.js";
import { managerContext } from "../../helpers/context.js";

describe("parseMasOutdated", () => {
  it("parses id, name and versions, keeping names with spaces", () => {
    const out = "497799835 Xcode (15.0 -> 15.1)\n1295203466 Microsoft Remote Desktop (10.9.1 -> 10.9.2)\n";
    expect(parseMasOutdated(out)).toEqual([
      { name: "Xcode", currentVersion: "15.0", latestVersion: "15.1", manager: "mas", requiresPrivilege: false, ref: "497799835" },
      {
        name: "Microsoft Remote Desktop",
        currentVersion: "10.9.1",
        latestVersion: "10.9.2",
        manager: "mas",
        requiresPrivilege: false,
        ref: "1295203466",
      },
    ]);
  });

  it("skips warnings and blank lines", () => {
    expect(parseMasOutdated("Warning: something\n\n")).toEqual([]);
  });

  it("throws on an unrecognised line", () => {
    expect(() => parseMasOutdated("Error: Not signed in")).toThrow(expect.objectContaining({ code: UpdaterErrorCode.INVOCATION_FAILED }));
  });
});

describe("MasManager", () => {
  it("upgrades by App Store id", async () => {
    const ctx = managerContext();
    ctx.executor.on(["mas", "outdated"], { stdout: "497799835 Xcode (15.0 -> 15.1)\n" });
    ctx.executor.on(["mas", "upgrade"], {});
    const manager = new MasManager(ctx);
    const result = await manager.applyUpdates(await manager.checkUpdates(), false);
    expect(result.updated.map((p) => p.name)).toEqual(["Xcode"]);
    expect(ctx.executor.commands()).toContain("mas upgrade 497799835");
  });

  it("probes availability with --version", async () => {
    const ctx = managerContext();
    expect(await new MasManager(ctx).isAvailable()).toBe(false);
    ctx.executor.on(["mas", "--version"], { stdout: "1.8.6" });
    expect(await new MasManager(ctx).isAvailable()).toBe(true);
  });

  it("has no cleanup or self-update", () => {
    const manager = new MasManager(managerContext());
    expect("cleanup" in manager).toBe(false);
    expect("selfUpdate" in manager).toBe(false);
  });
});
