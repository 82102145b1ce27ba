import { NpmManager, parseNpmOutdated } from "../../../src/managers/npm.js";
import { UpdaterErrorCode } from "../../../src/shared/errors.js";
import { managerContext } from "../../helpers/context.js";

describe("parseNpmOutdated", () => {
  it("maps each entry using current and latest", () => {
    const out = JSON.stringify({
      typescript: { current: "5.3.3", wanted: "5.4.5", latest: "5.4.5", dependent: "global" },
      "@scope/tool": { wanted: "2.0.0", latest: "2.0.0" },
    });
    expect(parseNpmOutdated(out)).toEqual([
      { name: "typescript", currentVersion: "5.3.3", latestVersion: "5.4.5", manager: "npm", requiresPrivilege: false },
      { name: "@scope/tool", currentVersion: "missing", latestVersion: "2.0.0", manager: "npm", requiresPrivilege: false },
    ]);
  });

  it("treats empty output and {} as nothing to do", () => {
    expect(parseNpmOutdated("")).toEqual([]);
    expect(parseNpmOutdated("{}\n")).toEqual([]);
  });

  it("surfaces npm's JSON error object", () => {
    const out = JSON.stringify({ error: { code: "E404", summary: "registry unreachable" } });
    expect(() => parseNpmOutdated(out)).toThrow("npm outdated reported an error: registry unreachable");
  });

  it("throws INVOCATION_FAILED on non-JSON output", () => {
    expect(() => parseNpmOutdated("npm ERR!")).toThrow(expect.objectContaining({ code: UpdaterErrorCode.INVOCATION_FAILED }));
    expect(() => parseNpmOutdated("[]")).toThrow(expect.objectContaining({ code: UpdaterErrorCode.INVOCATION_FAILED }));
  });
});

describe("NpmManager", () => {
  it("treats exit 1 from npm outdated as updates available", async () => {
    const ctx = managerContext();
    ctx.executor.on(["npm", "outdated"], { exitCode: 1, stdout: JSON.stringify({ eslint: { current: "8.0.0", latest: "9.0.0" } }) });
    const found = await new NpmManager(ctx).checkUpdates();
    expect(found.map((p) => p.name)).toEqual(["eslint"]);
  });

  it("fails discovery on other exit codes", async () => {
    const ctx = managerContext();
    ctx.executor.on(["npm", "outdated"], { exitCode: 254, stderr: "npm ERR! code ENOENT" });
    await expect(new NpmManager(ctx).checkUpdates()).rejects.toMatchObject({ code: UpdaterErrorCode.INVOCATION_FAILED });
  });

  it("installs @latest per package and records per-package failures", async () => {
    const ctx = managerContext();
    ctx.executor.on(["npm", "install", "-g", "eslint@latest"], {});
    ctx.executor.on(["npm", "install", "-g", "prettier@latest"], { exitCode: 1, stderr: "EACCES" });
    const pkgs = ["eslint", "prettier"].map((name) => ({ name, currentVersion: "1", latestVersion: "2", manager: "npm", requiresPrivilege: false }));
    const result = await new NpmManager(ctx).applyUpdates(pkgs, false);
    expect(result.status).toBe("partial_success");
    expect(result.updated.map((p) => p.name)).toEqual(["eslint"]);
    expect(result.errors).toEqual([
      {
        code: UpdaterErrorCode.INVOCATION_FAILED,
        message: "prettier: 'npm install -g prettier@latest' exited with 1: EACCES",
        step: "apply",
        exitCode: 1,
        stderr: "EACCES",
      },
    ]);
  });

  it("simulates without spawning in a dry run", async () => {
    const ctx = managerContext();
    const pkgs = [{ name: "eslint", currentVersion: "1", latestVersion: "2", manager: "npm", requiresPrivilege: false }];
    const result = await new NpmManager(ctx).applyUpdates(pkgs, true);
    expect(result.status).toBe("simulated");
    expect(result.updated).toEqual(pkgs);
    expect(ctx.executor.calls).toHaveLength(0);
  });
});
