import type { ManagerOutcome } from "../types/package.js";
import type { RunMode, RunReport } from "../types/report.js";
import { aggregateStatus } from "./status.js";

/**
 * Accumulates manager outcomes over a run. The orchestrator is the only
 * writer; `freeze` produces the immutable report and closes the builder.
 */
export class RunReportBuilder {
  private readonly startedAt: Date;
  private readonly outcomes = new Map<string, ManagerOutcome>();
  private readonly notRun: string[] = [];
  private frozen = false;

  /**
   * @param order Manager ids in registry order; results are reported in this
   *   order regardless of which manager finished first.
   */
  constructor(
    private readonly mode: RunMode,
    private readonly order: readonly string[],
    private readonly now: () => Date = () => new Date(),
  ) {
    this.startedAt = now();
  }

  record(outcome: ManagerOutcome): void {
    this.assertOpen();
    if (this.outcomes.has(outcome.manager)) {
      throw new Error(`Outcome for '${outcome.manager}' already recorded`);
    }
    this.outcomes.set(outcome.manager, outcome);
  }

  markNotRun(ids: readonly string[]): void {
    this.assertOpen();
    this.notRun.push(...ids.filter((id) => !this.outcomes.has(id)));
  }

  freeze(cancelled: boolean): RunReport {
    this.assertOpen();
    this.frozen = true;

    const results = new Map<string, ManagerOutcome>();
    const rank = (id: string): number => {
      const i = this.order.indexOf(id);
      return i === -1 ? this.order.length : i;
    };
    const ids = [...this.outcomes.keys()].sort((a, b) => rank(a) - rank(b));
    for (const id of ids) {
      const outcome = this.outcomes.get(id);
      if (outcome) results.set(id, Object.freeze({ ...outcome }));
    }

    return Object.freeze({
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      mode: Object.freeze({ ...this.mode }),
      results,
      notRun: Object.freeze([...this.notRun]),
      overallStatus: aggregateStatus([...results.values()].map((r) => r.status), cancelled),
    });
  }

  private assertOpen(): void {
    if (this.frozen) throw new Error("Run report is already frozen");
  }
}
