import type { UpdateManager } from "../managers/contract.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import type { MaintenanceStep, PackageInfo, UpdateResult } from "../types/package.js";

/**
 * One manager's view for the duration of a single run. Enforces the contract
 * that nothing but `isAvailable` is called on a manager that reported itself
 * unavailable.
 */
export class ManagerSession {
  private available: boolean | null = null;

  constructor(readonly manager: UpdateManager) {}

  get id(): string {
    return this.manager.id;
  }

  async isAvailable(): Promise<boolean> {
    this.available = await this.manager.isAvailable();
    return this.available;
  }

  checkUpdates(): Promise<PackageInfo[]> {
    this.assertAvailable("checkUpdates");
    return this.manager.checkUpdates();
  }

  applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    this.assertAvailable("applyUpdates");
    return this.manager.applyUpdates(candidates, dryRun);
  }

  get hasCleanup(): boolean {
    return typeof this.manager.cleanup === "function";
  }

  get hasSelfUpdate(): boolean {
    return typeof this.manager.selfUpdate === "function";
  }

  /** Privileged argv for a maintenance step, if the manager declares one. */
  privilegeFor(step: MaintenanceStep): readonly string[] | undefined {
    return step === "cleanup" ? this.manager.cleanupPrivilege : this.manager.selfUpdatePrivilege;
  }

  async cleanup(): Promise<void> {
    this.assertAvailable("cleanup");
    await this.manager.cleanup?.();
  }

  async selfUpdate(): Promise<void> {
    this.assertAvailable("selfUpdate");
    await this.manager.selfUpdate?.();
  }

  private assertAvailable(method: string): void {
    if (this.available !== true) {
      throw new UpdaterError(
        UpdaterErrorCode.MANAGER_UNAVAILABLE,
        `${method} called on '${this.manager.id}' without a successful availability probe`,
        { manager: this.manager.id },
      );
    }
  }
}
