import type { ErrorRecord } from "../shared/errors.js";

/**
 * One discoverable update. Versions are opaque strings: ecosystems use
 * incompatible schemes, so they are never parsed or compared.
 */
export interface PackageInfo {
  readonly name: string;
  readonly currentVersion: string;
  readonly latestVersion: string;
  /** Owning manager id. */
  readonly manager: string;
  /** Best-effort flag set by the manager. */
  readonly requiresPrivilege: boolean;
  /** Ecosystem handle used when applying (App Store id, cask/formula kind). Defaults to name. */
  readonly ref?: string;
  /** argv prefix matched against the sudo whitelist, e.g. ["tlmgr", "update"]. */
  readonly privilegedCommand?: readonly string[];
}

/** A candidate deliberately not applied. */
export interface SkippedPackage {
  readonly package: PackageInfo;
  readonly reason: string;
}

export type MaintenanceStep = "cleanup" | "self-update";

/** A cleanup or self-update step not run because privilege was refused. */
export interface SkippedMaintenance {
  readonly step: MaintenanceStep;
  readonly reason: string;
}

/** Per-manager outcome states. */
export type ManagerStatus =
  | "success"
  | "partial_success"
  | "simulated"
  | "degraded"
  | "skipped"
  | "unavailable"
  | "failed"
  | "cancelled";

/** Outcome of one manager's update attempt. Never mutated once returned. */
export interface UpdateResult {
  readonly manager: string;
  readonly status: ManagerStatus;
  readonly updated: readonly PackageInfo[];
  readonly skipped: readonly SkippedPackage[];
  readonly errors: readonly ErrorRecord[];
  readonly durationMs: number;
}

/**
 * What the orchestrator records for a manager: the update result plus the
 * discovery view (candidates after exclusion, and what exclusion removed).
 */
export interface ManagerOutcome extends UpdateResult {
  readonly candidates: readonly PackageInfo[];
  readonly excluded: readonly PackageInfo[];
  /** Maintenance steps skipped by privilege policy; never a failure. */
  readonly maintenanceSkipped?: readonly SkippedMaintenance[];
  readonly note?: string;
}

export function packageRef(pkg: PackageInfo): string {
  return pkg.ref ?? pkg.name;
}
