import { UpdaterError, UpdaterErrorCode, isUpdaterError, toErrorRecord } from "../../../src/shared/errors.js";

describe("UpdaterError", () => {
  it("creates error with code and message", () => {
    const err = new UpdaterError(UpdaterErrorCode.NOT_FOUND, "Unknown manager 'apt'");
    expect(err.code).toBe(UpdaterErrorCode.NOT_FOUND);
    expect(err.message).toBe("Unknown manager 'apt'");
    expect(err.name).toBe("UpdaterError");
    expect(err instanceof Error).toBe(true);
  });

  it("includes optional context", () => {
    const err = new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "boom", { exitCode: 2 });
    expect(err.context).toEqual({ exitCode: 2 });
  });

  it("isUpdaterError narrows by code", () => {
    const err = new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, "bad");
    expect(isUpdaterError(err)).toBe(true);
    expect(isUpdaterError(err, UpdaterErrorCode.CONFIG_INVALID)).toBe(true);
    expect(isUpdaterError(err, UpdaterErrorCode.NOT_FOUND)).toBe(false);
    expect(isUpdaterError(new Error("plain"))).toBe(false);
  });
});

describe("toErrorRecord", () => {
  it("keeps code, exit code and stderr from an UpdaterError", () => {
    const err = new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "brew exited with 1", { exitCode: 1, stderr: "Error: no network" });
    expect(toErrorRecord(err, "discovery")).toEqual({
      code: UpdaterErrorCode.INVOCATION_FAILED,
      message: "brew exited with 1",
      step: "discovery",
      exitCode: 1,
      stderr: "Error: no network",
    });
  });

  it("drops empty stderr and non-numeric exit codes", () => {
    const err = new UpdaterError(UpdaterErrorCode.INVOCATION_TIMEOUT, "slow", { exitCode: "x", stderr: "" });
    const record = toErrorRecord(err);
    expect(record.exitCode).toBeUndefined();
    expect(record.stderr).toBeUndefined();
  });

  it("maps unknown throwables to INVOCATION_FAILED with a reason", () => {
    expect(toErrorRecord(new TypeError("x is not a function"), "apply")).toEqual({
      code: UpdaterErrorCode.INVOCATION_FAILED,
      message: "x is not a function",
      step: "apply",
    });
    expect(toErrorRecord("oops").message).toBe("oops");
    expect(toErrorRecord(new Error("")).message).toBe("unknown error");
  });
});
