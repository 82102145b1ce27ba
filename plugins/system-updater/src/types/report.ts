import type { ManagerOutcome } from "./package.js";

export type RunKind = "status" | "update";

export interface RunMode {
  readonly kind: RunKind;
  readonly dryRun: boolean;
}

export type OverallStatus = "success" | "partial_success" | "skipped" | "failed" | "cancelled";

/** Whole-run aggregate. Frozen once the run completes. */
export interface RunReport {
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly mode: RunMode;
  /** Keyed by manager id, in registry order. */
  readonly results: ReadonlyMap<string, ManagerOutcome>;
  /** Managers selected for the run that never started (cancellation). */
  readonly notRun: readonly string[];
  readonly overallStatus: OverallStatus;
}

export interface ManagerListing {
  readonly id: string;
  readonly available: boolean;
  readonly enabled: boolean;
}
