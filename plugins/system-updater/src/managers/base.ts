import type { Logger } from "pino";
import type { ExecutionAdapter } from "../execution/adapter.js";
import type { Command } from "../types/command.js";
import type { PackageInfo, UpdateResult } from "../types/package.js";
import type { ErrorRecord } from "../shared/errors.js";
import { deriveManagerStatus } from "../report/status.js";
import type { ManagerContext, UpdateManager } from "./contract.js";

/**
 * Shared plumbing for managers driven by a single CLI binary: the version
 * probe and the one-invocation-per-package apply loop.
 */
export abstract class BaseManager implements UpdateManager {
  abstract readonly id: string;
  protected abstract readonly binary: string;

  protected readonly adapter: ExecutionAdapter;
  protected readonly logger: Logger;

  constructor(ctx: ManagerContext) {
    this.adapter = ctx.adapter;
    this.logger = ctx.logger;
  }

  async isAvailable(): Promise<boolean> {
    return this.adapter.probe({ argv: [this.binary, "--version"] });
  }

  abstract checkUpdates(): Promise<PackageInfo[]>;
  abstract applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult>;

  /**
   * Apply candidates one at a time so each failure is attributed to its package.
   * Stops early when the run is cancelled.
   */
  protected async applyEach(
    candidates: readonly PackageInfo[],
    dryRun: boolean,
    commandFor: (pkg: PackageInfo) => Command,
  ): Promise<UpdateResult> {
    const start = performance.now();
    if (dryRun) {
      return {
        manager: this.id,
        status: "simulated",
        updated: [...candidates],
        skipped: [],
        errors: [],
        durationMs: Math.round(performance.now() - start),
      };
    }

    const updated: PackageInfo[] = [];
    const errors: ErrorRecord[] = [];
    for (const pkg of candidates) {
      const r = await this.adapter.run(commandFor(pkg), { mutating: true });
      if (r.ok) {
        updated.push(pkg);
        this.logger.info({ package: pkg.name, from: pkg.currentVersion, to: pkg.latestVersion }, "Updated package");
        continue;
      }
      if (r.error) {
        errors.push({ ...r.error, step: "apply", message: `${pkg.name}: ${r.error.message}` });
      }
      if (r.cancelled) break;
    }

    return {
      manager: this.id,
      status: deriveManagerStatus({ updated, skipped: [], errors, dryRun }),
      updated,
      skipped: [],
      errors,
      durationMs: Math.round(performance.now() - start),
    };
  }
}
