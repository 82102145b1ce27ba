import { GemManager, parseGemOutdated } from "../../../src/managers/gem.js";
import { UpdaterErrorCode } from "../../../src/shared/errors.js";
import { managerContext } from "../../helpers/context.js";

describe("parseGemOutdated", () => {
  it("parses name (current < latest) lines", () => {
    expect(parseGemOutdated("rake (13.0.6 < 13.1.0)\nbundler (2.4.1 < 2.5.3)\n")).toEqual([
      { name: "rake", currentVersion: "13.0.6", latestVersion: "13.1.0", manager: "gem", requiresPrivilege: false },
      { name: "bundler", currentVersion: "2.4.1", latestVersion: "2.5.3", manager: "gem", requiresPrivilege: false },
    ]);
  });

  it("treats empty output as nothing to do", () => {
    expect(parseGemOutdated("")).toEqual([]);
  });

  it("throws on an unrecognised line", () => {
    expect(() => parseGemOutdated("ERROR:  While executing gem")).toThrow(
      expect.objectContaining({ code: UpdaterErrorCode.INVOCATION_FAILED }),
    );
  });
});

describe("GemManager", () => {
  it("updates into the user install and cleans up", async () => {
    const ctx = managerContext();
    ctx.executor.on(["gem"], {});
    const manager = new GemManager(ctx);
    await manager.applyUpdates([{ name: "rake", currentVersion: "1", latestVersion: "2", manager: "gem", requiresPrivilege: false }], false);
    await manager.cleanup();
    await manager.selfUpdate();
    expect(ctx.executor.commands()).toEqual(["gem update --user-install rake", "gem cleanup", "gem update --system --user-install"]);
  });
});
