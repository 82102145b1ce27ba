// Library surface: the three caller-facing operations plus the building blocks
// for embedding the updater elsewhere.
import type { Logger } from "pino";
import { createUpdater } from "./app.js";
import type { Executor } from "./execution/executor.js";
import type { UpdaterConfig } from "./types/config.js";
import type { ManagerListing, RunReport } from "./types/report.js";

export interface OperationOptions {
  logger: Logger;
  executor?: Executor;
  signal?: AbortSignal;
}

/** Discovery only; nothing is mutated. */
export function runStatus(config: UpdaterConfig, options: OperationOptions): Promise<RunReport> {
  const { orchestrator } = createUpdater(config, options);
  return orchestrator.runStatus({ signal: options.signal });
}

/** Apply updates, optionally limited to `managerFilter`. `dryRun` defaults to the config's flag. */
export function runUpdate(
  config: UpdaterConfig,
  options: OperationOptions & { managerFilter?: readonly string[]; dryRun?: boolean },
): Promise<RunReport> {
  const { orchestrator } = createUpdater(config, options);
  return orchestrator.runUpdate({
    managers: options.managerFilter,
    dryRun: options.dryRun ?? config.dryRun,
    signal: options.signal,
  });
}

export function listManagers(config: UpdaterConfig, options: OperationOptions): Promise<ManagerListing[]> {
  const { orchestrator } = createUpdater(config, options);
  return orchestrator.listManagers();
}

export { createUpdater } from "./app.js";
export type { Updater, UpdaterDeps } from "./app.js";
export { createLogger } from "./logger.js";
export { loadConfig, parseConfig, renderDefaultConfig, validateConfigFile } from "./config/loader.js";
export { ExecutionAdapter } from "./execution/adapter.js";
export type { Invocation, InvokeOptions } from "./execution/adapter.js";
export { ExecaExecutor } from "./execution/executor.js";
export type { Executor, ExecOptions, ExecResult } from "./execution/executor.js";
export type { UpdateManager, ManagerContext } from "./managers/contract.js";
export { createManager, KNOWN_MANAGERS } from "./managers/factory.js";
export { ManagerRegistry } from "./registry/manager-registry.js";
export { SudoNegotiator } from "./sudo/negotiator.js";
export { Orchestrator } from "./orchestrator/orchestrator.js";
export { aggregateStatus, deriveManagerStatus, exitCodeFor } from "./report/status.js";
export { renderReport, renderReportJson, reportToJson } from "./report/render.js";
export { UpdaterError, UpdaterErrorCode, toErrorRecord } from "./shared/errors.js";
export type { ErrorRecord, ErrorStep } from "./shared/errors.js";
export type {
  Command,
  PackageInfo,
  SkippedPackage,
  MaintenanceStep,
  SkippedMaintenance,
  ManagerStatus,
  UpdateResult,
  ManagerOutcome,
  RunKind,
  RunMode,
  OverallStatus,
  RunReport,
  ManagerListing,
  SudoStrategy,
  SudoOutcome,
  SudoDecision,
  CredentialState,
  LogLevel,
  ManagerSettings,
  UpdaterConfig,
} from "./types/index.js";
