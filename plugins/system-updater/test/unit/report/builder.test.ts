import { RunReportBuilder } from "../../../src/report/builder.js";
import type { ManagerOutcome, ManagerStatus } from "../../../src/types/package.js";

function outcome(manager: string, status: ManagerStatus): ManagerOutcome {
  return { manager, status, candidates: [], excluded: [], updated: [], skipped: [], errors: [], durationMs: 0 };
}

function clock(): () => Date {
  let t = Date.parse("2026-01-01T00:00:00.000Z");
  return () => new Date((t += 1_000));
}

describe("RunReportBuilder", () => {
  it("orders results by registry order regardless of completion order", () => {
    const builder = new RunReportBuilder({ kind: "update", dryRun: false }, ["a", "b", "c"], clock());
    builder.record(outcome("c", "success"));
    builder.record(outcome("a", "failed"));
    const report = builder.freeze(false);
    expect([...report.results.keys()]).toEqual(["a", "c"]);
    expect(report.overallStatus).toBe("failed");
  });

  it("stamps start and finish times", () => {
    const report = new RunReportBuilder({ kind: "status", dryRun: false }, [], clock()).freeze(false);
    expect(report.startedAt).toBe("2026-01-01T00:00:01.000Z");
    expect(report.finishedAt).toBe("2026-01-01T00:00:02.000Z");
  });

  it("rejects duplicate outcomes", () => {
    const builder = new RunReportBuilder({ kind: "update", dryRun: false }, ["a"]);
    builder.record(outcome("a", "success"));
    expect(() => builder.record(outcome("a", "success"))).toThrow("Outcome for 'a' already recorded");
  });

  it("is closed and immutable once frozen", () => {
    const builder = new RunReportBuilder({ kind: "update", dryRun: false }, ["a", "b"]);
    builder.record(outcome("a", "success"));
    builder.markNotRun(["a", "b"]);
    const report = builder.freeze(true);
    expect(report.notRun).toEqual(["b"]);
    expect(report.overallStatus).toBe("cancelled");
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.results.get("a"))).toBe(true);
    expect(() => builder.record(outcome("b", "success"))).toThrow("Run report is already frozen");
  });
});
