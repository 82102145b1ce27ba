export type { Command } from "./command.js";
export { formatCommand } from "./command.js";
export type { PackageInfo, SkippedPackage, MaintenanceStep, SkippedMaintenance, ManagerStatus, UpdateResult, ManagerOutcome } from "./package.js";
export { packageRef } from "./package.js";
export type { RunKind, RunMode, OverallStatus, RunReport, ManagerListing } from "./report.js";
export type { SudoStrategy, SudoOutcome, SudoDecision, CredentialState } from "./sudo.js";
export type { LogLevel, ManagerSettings, UpdaterConfig } from "./config.js";
