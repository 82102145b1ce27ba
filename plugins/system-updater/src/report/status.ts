// Status derivation and aggregation rules for a run.
import type { ErrorRecord } from "../shared/errors.js";
import type { ManagerStatus, PackageInfo, SkippedPackage } from "../types/package.js";
import type { OverallStatus } from "../types/report.js";

export interface StatusInputs {
  readonly updated: readonly PackageInfo[];
  readonly skipped: readonly SkippedPackage[];
  readonly errors: readonly ErrorRecord[];
  readonly dryRun: boolean;
}

/**
 * Status of one manager's apply step from what it achieved.
 * Errors with nothing applied is a failure; a mix with progress is partial.
 */
export function deriveManagerStatus({ updated, skipped, errors, dryRun }: StatusInputs): ManagerStatus {
  if (errors.length > 0) {
    return updated.length > 0 ? "partial_success" : "failed";
  }
  if (skipped.length > 0) {
    return updated.length > 0 ? "partial_success" : "skipped";
  }
  return dryRun ? "simulated" : "success";
}

// Worst-of ordering: failed > partial > success > skipped.
const RANK: Record<ManagerStatus, number> = {
  failed: 4,
  partial_success: 3,
  degraded: 3,
  success: 2,
  simulated: 2,
  skipped: 1,
  unavailable: 1,
  cancelled: 0,
};

function toOverall(status: ManagerStatus): OverallStatus {
  switch (status) {
    case "failed":
      return "failed";
    case "partial_success":
    case "degraded":
      return "partial_success";
    case "success":
    case "simulated":
      return "success";
    case "skipped":
    case "unavailable":
      return "skipped";
    case "cancelled":
      return "cancelled";
  }
}

/**
 * Overall run status: the worst status across managers that were not skipped.
 * A run with no managers is vacuously successful; one where every manager was
 * skipped or unavailable is skipped. Cancellation overrides everything.
 */
export function aggregateStatus(statuses: readonly ManagerStatus[], cancelled: boolean): OverallStatus {
  if (cancelled || statuses.includes("cancelled")) return "cancelled";
  if (statuses.length === 0) return "success";
  let worst: ManagerStatus = statuses[0] ?? "success";
  for (const status of statuses) {
    if (RANK[status] > RANK[worst]) worst = status;
  }
  return toOverall(worst);
}

/** Process exit code for a run, so schedulers can alert without parsing output. */
export function exitCodeFor(status: OverallStatus): number {
  switch (status) {
    case "success":
      return 0;
    case "failed":
      return 1;
    case "skipped":
      return 2;
    case "partial_success":
      return 3;
    case "cancelled":
      return 130;
  }
}
