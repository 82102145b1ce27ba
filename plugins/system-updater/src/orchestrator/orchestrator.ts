// Orchestrator: drives the registry through one run and builds the report.
//
// Per manager: availability → discovery → exclusion → privilege negotiation
// → apply → cleanup → self-update, strictly in that order. Managers are
// independent and may run concurrently up to `parallelism`. Every failure is
// caught at the manager boundary and becomes part of that manager's outcome;
// only selection errors (unknown id) and overlapping runs throw to the caller.
import type { Logger } from "pino";
import type { ExecutionAdapter } from "../execution/adapter.js";
import type { RegistryEntry, ManagerRegistry } from "../registry/manager-registry.js";
import type { SudoNegotiator } from "../sudo/negotiator.js";
import type { ErrorRecord, ErrorStep } from "../shared/errors.js";
import { UpdaterError, UpdaterErrorCode, toErrorRecord } from "../shared/errors.js";
import type {
  MaintenanceStep,
  ManagerOutcome,
  ManagerStatus,
  PackageInfo,
  SkippedMaintenance,
  SkippedPackage,
} from "../types/package.js";
import type { ManagerListing, RunMode, RunReport } from "../types/report.js";
import type { SudoDecision, SudoOutcome } from "../types/sudo.js";
import { RunReportBuilder } from "../report/builder.js";
import { deriveManagerStatus } from "../report/status.js";
import { ManagerSession } from "./session.js";
import { runBounded } from "./pool.js";

export interface RunPolicy {
  /** Excluded for every manager, by exact package name. */
  readonly globalExclusions: readonly string[];
  /** Managers run at once; 1 is sequential. */
  readonly parallelism: number;
  /** Overall deadline; 0 disables it. */
  readonly runDeadlineMs: number;
}

export interface OrchestratorOptions {
  readonly registry: ManagerRegistry;
  readonly negotiator: SudoNegotiator;
  readonly adapter: ExecutionAdapter;
  readonly logger: Logger;
  readonly policy: RunPolicy;
}

export interface StatusRequest {
  readonly signal?: AbortSignal;
}

export interface UpdateRequest {
  /** Restrict the run to these ids. Unknown ids raise NOT_FOUND before anything runs. */
  readonly managers?: readonly string[];
  readonly dryRun: boolean;
  readonly signal?: AbortSignal;
}

interface Accumulator {
  candidates: PackageInfo[];
  excluded: PackageInfo[];
  updated: PackageInfo[];
  skipped: SkippedPackage[];
  maintenanceSkipped: SkippedMaintenance[];
  errors: ErrorRecord[];
}

export class Orchestrator {
  private readonly registry: ManagerRegistry;
  private readonly negotiator: SudoNegotiator;
  private readonly adapter: ExecutionAdapter;
  private readonly logger: Logger;
  private readonly policy: RunPolicy;
  private readonly globalExclusions: ReadonlySet<string>;
  private running = false;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.negotiator = options.negotiator;
    this.adapter = options.adapter;
    this.logger = options.logger;
    this.policy = options.policy;
    this.globalExclusions = new Set(options.policy.globalExclusions);
  }

  /** Discovery only: availability and outdated packages for every enabled manager. */
  async runStatus(request: StatusRequest = {}): Promise<RunReport> {
    return this.execute({ kind: "status", dryRun: false }, this.registry.enabled(), request.signal);
  }

  /** Discover and apply updates, optionally restricted to `managers`. */
  async runUpdate(request: UpdateRequest): Promise<RunReport> {
    const selected = this.registry.select(request.managers);
    return this.execute({ kind: "update", dryRun: request.dryRun }, selected, request.signal);
  }

  /** Every registered manager, disabled ones included, with a live availability probe. */
  async listManagers(): Promise<ManagerListing[]> {
    return Promise.all(
      this.registry.all().map(async (entry) => ({
        id: entry.manager.id,
        available: await this.probeAvailability(entry),
        enabled: entry.enabled,
      })),
    );
  }

  private async probeAvailability(entry: RegistryEntry): Promise<boolean> {
    try {
      return await entry.manager.isAvailable();
    } catch (err) {
      this.logger.warn({ manager: entry.manager.id, error: toErrorRecord(err).message }, "Availability probe threw");
      return false;
    }
  }

  private async execute(mode: RunMode, selected: readonly RegistryEntry[], external?: AbortSignal): Promise<RunReport> {
    if (this.running) {
      throw new UpdaterError(UpdaterErrorCode.RUN_IN_PROGRESS, "Another run is already in progress");
    }
    this.running = true;

    const controller = new AbortController();
    const onExternalAbort = (): void => controller.abort();
    if (external?.aborted) controller.abort();
    external?.addEventListener("abort", onExternalAbort, { once: true });
    const deadline =
      this.policy.runDeadlineMs > 0
        ? setTimeout(() => {
            this.logger.warn({ deadlineMs: this.policy.runDeadlineMs }, "Run deadline reached, cancelling");
            controller.abort();
          }, this.policy.runDeadlineMs)
        : undefined;

    // Status runs never mutate, so they run under the dry-run guard as well.
    const exitScope = this.adapter.enterRun({ dryRun: mode.dryRun || mode.kind === "status", signal: controller.signal });
    this.negotiator.reset();

    const ids = selected.map((e) => e.manager.id);
    const builder = new RunReportBuilder(mode, ids);
    this.logger.info({ mode: mode.kind, dryRun: mode.dryRun, managers: ids }, "Run started");

    try {
      const notStarted = await runBounded(
        selected,
        this.policy.parallelism,
        async (entry) => {
          builder.record(await this.runManager(entry, mode, controller.signal));
        },
        controller.signal,
      );
      builder.markNotRun(notStarted.map((i) => ids[i] ?? ""));
      const report = builder.freeze(controller.signal.aborted);
      this.logger.info({ overallStatus: report.overallStatus, notRun: report.notRun }, "Run finished");
      return report;
    } finally {
      if (deadline) clearTimeout(deadline);
      external?.removeEventListener("abort", onExternalAbort);
      exitScope();
      this.running = false;
    }
  }

  private async runManager(entry: RegistryEntry, mode: RunMode, signal: AbortSignal): Promise<ManagerOutcome> {
    const start = performance.now();
    const session = new ManagerSession(entry.manager);
    const log = this.logger.child({ manager: session.id });
    const acc: Accumulator = { candidates: [], excluded: [], updated: [], skipped: [], maintenanceSkipped: [], errors: [] };
    // Step in progress, for anything that escapes the per-step handlers.
    let step: ErrorStep = "availability";

    const finish = (status: ManagerStatus, note?: string): ManagerOutcome => {
      const outcome: ManagerOutcome = {
        manager: session.id,
        status,
        candidates: acc.candidates,
        excluded: acc.excluded,
        updated: acc.updated,
        skipped: acc.skipped,
        errors: acc.errors,
        durationMs: Math.round(performance.now() - start),
        maintenanceSkipped: acc.maintenanceSkipped.length > 0 ? acc.maintenanceSkipped : undefined,
        note,
      };
      log.info({ status, candidates: acc.candidates.length, updated: acc.updated.length, skipped: acc.skipped.length, errors: acc.errors.length }, "Manager finished");
      return outcome;
    };

    if (!entry.enabled) return finish("skipped", "disabled in configuration");

    try {
      if (!(await session.isAvailable())) return finish("unavailable", "tool not installed");
      if (signal.aborted) return finish("cancelled");

      step = "discovery";
      let found: PackageInfo[];
      try {
        found = await session.checkUpdates();
      } catch (err) {
        acc.errors.push(toErrorRecord(err, "discovery"));
        return finish(signal.aborted ? "cancelled" : "failed");
      }

      for (const pkg of found) {
        if (this.globalExclusions.has(pkg.name) || entry.exclusions.has(pkg.name)) acc.excluded.push(pkg);
        else acc.candidates.push(pkg);
      }
      if (mode.kind === "status") return finish(signal.aborted ? "cancelled" : "success");

      step = "privilege";
      const allowed = await this.negotiate(acc, session.id, mode.dryRun);
      if (allowed === null) return finish("failed");
      if (signal.aborted) return finish("cancelled");

      step = "apply";
      if (allowed.length > 0) {
        try {
          const result = await session.applyUpdates(allowed, mode.dryRun);
          acc.updated.push(...result.updated);
          acc.skipped.push(...result.skipped);
          acc.errors.push(...result.errors);
        } catch (err) {
          acc.errors.push(toErrorRecord(err, "apply"));
        }
      }
      if (signal.aborted) return finish("cancelled");

      step = "cleanup";
      let status = deriveManagerStatus({ ...acc, dryRun: mode.dryRun });
      if (!mode.dryRun && !(await this.maintain(entry, session, acc, signal))) {
        if (status === "success") status = "degraded";
      }
      if (signal.aborted) return finish("cancelled");
      return finish(status);
    } catch (err) {
      acc.errors.push(toErrorRecord(err, step));
      return finish(signal.aborted ? "cancelled" : "failed");
    }
  }

  /**
   * Consult the negotiator for each privileged candidate. Returns the
   * candidates cleared to apply, or null when the negotiator aborted the
   * manager's update step (every candidate is then recorded as skipped).
   */
  private async negotiate(acc: Accumulator, id: string, dryRun: boolean): Promise<PackageInfo[] | null> {
    const allowed: PackageInfo[] = [];
    let abort: SudoDecision | null = null;
    for (const pkg of acc.candidates) {
      if (!pkg.requiresPrivilege) {
        allowed.push(pkg);
        continue;
      }
      const decision = await this.negotiator.decide(pkg.privilegedCommand ?? [id], { simulate: dryRun });
      if (decision.outcome === "proceed") {
        allowed.push(pkg);
      } else if (decision.outcome === "skip") {
        acc.skipped.push({ package: pkg, reason: decision.reason });
      } else {
        abort = decision;
        break;
      }
    }
    if (!abort) return allowed;

    const reason = abort.reason;
    acc.skipped.length = 0;
    acc.skipped.push(...acc.candidates.map((pkg) => ({ package: pkg, reason })));
    acc.errors.push({ code: UpdaterErrorCode.PRIVILEGE_ABORTED, message: reason, step: "privilege" });
    return null;
  }

  /**
   * Cleanup then self-update, each isolated. A step that declares a privileged
   * command runs only once the negotiator clears it; a refusal is recorded in
   * `maintenanceSkipped` and is not a failure. Returns false if either step failed.
   */
  private async maintain(entry: RegistryEntry, session: ManagerSession, acc: Accumulator, signal: AbortSignal): Promise<boolean> {
    let ok = true;
    const steps: Array<[MaintenanceStep, boolean, () => Promise<void>]> = [
      ["cleanup", entry.cleanup && session.hasCleanup, () => session.cleanup()],
      ["self-update", entry.selfUpdate && session.hasSelfUpdate, () => session.selfUpdate()],
    ];
    for (const [step, enabled, run] of steps) {
      if (!enabled || signal.aborted) continue;
      const clearance = await this.clearMaintenance(session, step, acc);
      if (clearance === "skip") continue;
      if (clearance === "abort") {
        ok = false;
        continue;
      }
      try {
        await run();
      } catch (err) {
        acc.errors.push(toErrorRecord(err, step));
        ok = false;
      }
    }
    return ok;
  }

  private async clearMaintenance(session: ManagerSession, step: MaintenanceStep, acc: Accumulator): Promise<SudoOutcome> {
    const privileged = session.privilegeFor(step);
    if (!privileged) return "proceed";
    let decision: SudoDecision;
    try {
      decision = await this.negotiator.decide(privileged);
    } catch (err) {
      acc.errors.push(toErrorRecord(err, "privilege"));
      return "abort";
    }
    if (decision.outcome === "skip") {
      acc.maintenanceSkipped.push({ step, reason: decision.reason });
    } else if (decision.outcome === "abort") {
      acc.errors.push({ code: UpdaterErrorCode.PRIVILEGE_ABORTED, message: decision.reason, step: "privilege" });
    }
    return decision.outcome;
  }
}
