import { aggregateStatus, deriveManagerStatus, exitCodeFor } from "../../../src/report/status.js";
import { UpdaterErrorCode } from "../../../src/shared/errors.js";
import { pkg } from "../../helpers/scripted-manager.js";

const error = { code: UpdaterErrorCode.INVOCATION_FAILED, message: "boom" };
const one = [pkg("m", "a")];
const skippedOne = [{ package: pkg("m", "b", true), reason: "policy" }];

describe("deriveManagerStatus", () => {
  it.each([
    ["nothing to do", { updated: [], skipped: [], errors: [] }, "success"],
    ["all updated", { updated: one, skipped: [], errors: [] }, "success"],
    ["errors only", { updated: [], skipped: [], errors: [error] }, "failed"],
    ["errors with progress", { updated: one, skipped: [], errors: [error] }, "partial_success"],
    ["skips with progress", { updated: one, skipped: skippedOne, errors: [] }, "partial_success"],
    ["only skips", { updated: [], skipped: skippedOne, errors: [] }, "skipped"],
  ] as const)("%s", (_label, inputs, expected) => {
    expect(deriveManagerStatus({ ...inputs, dryRun: false })).toBe(expected);
  });

  it("marks a clean dry run as simulated", () => {
    expect(deriveManagerStatus({ updated: one, skipped: [], errors: [], dryRun: true })).toBe("simulated");
  });
});

describe("aggregateStatus", () => {
  it("takes the worst status", () => {
    expect(aggregateStatus(["success", "partial_success", "skipped"], false)).toBe("partial_success");
    expect(aggregateStatus(["success", "failed", "partial_success"], false)).toBe("failed");
    expect(aggregateStatus(["success", "unavailable"], false)).toBe("success");
    expect(aggregateStatus(["simulated", "degraded"], false)).toBe("partial_success");
  });

  it("is success with no managers and skipped when every manager was skipped", () => {
    expect(aggregateStatus([], false)).toBe("success");
    expect(aggregateStatus(["skipped", "unavailable"], false)).toBe("skipped");
  });

  it("lets cancellation override everything", () => {
    expect(aggregateStatus(["failed"], true)).toBe("cancelled");
    expect(aggregateStatus(["success", "cancelled"], false)).toBe("cancelled");
  });
});

describe("exitCodeFor", () => {
  it("gives each overall status a distinct exit code", () => {
    expect(exitCodeFor("success")).toBe(0);
    expect(exitCodeFor("failed")).toBe(1);
    expect(exitCodeFor("skipped")).toBe(2);
    expect(exitCodeFor("partial_success")).toBe(3);
    expect(exitCodeFor("cancelled")).toBe(130);
  });
});
