import type { Logger } from "pino";
import type { ExecutionAdapter } from "../execution/adapter.js";
import type { PackageInfo, UpdateResult } from "../types/package.js";

/**
 * The capability set every package ecosystem implements. The orchestrator
 * drives implementations uniformly; adding an ecosystem means adding an
 * implementer, never a branch in the orchestrator.
 *
 * Implementations hold no state between calls: every method reflects the
 * system as it is now.
 */
export interface UpdateManager {
  readonly id: string;

  /** Side-effect-free presence probe of the underlying tool. */
  isAvailable(): Promise<boolean>;

  /** Discover outdated packages. Never mutates system state; an empty list is success. */
  checkUpdates(): Promise<PackageInfo[]>;

  /**
   * Bring each candidate up to date. With `dryRun` nothing is spawned and
   * `updated` lists what would have been applied.
   */
  applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult>;

  /** Best-effort removal of stale artifacts. */
  cleanup?(): Promise<void>;

  /** Update the ecosystem tool itself. Runs after applyUpdates. */
  selfUpdate?(): Promise<void>;

  /**
   * argv prefixes the Sudo Negotiator is consulted with before cleanup or
   * self-update run. Absent when the step needs no elevation.
   */
  readonly cleanupPrivilege?: readonly string[];
  readonly selfUpdatePrivilege?: readonly string[];
}

/** Collaborators handed to each manager at construction. */
export interface ManagerContext {
  readonly adapter: ExecutionAdapter;
  /** Child logger bound to `{ manager: id }`. */
  readonly logger: Logger;
}
