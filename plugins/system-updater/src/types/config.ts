import type { SudoStrategy } from "./sudo.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Resolved per-manager settings, in declaration order. */
export interface ManagerSettings {
  readonly id: string;
  readonly enabled: boolean;
  readonly exclusions: readonly string[];
  readonly cleanup: boolean;
  readonly selfUpdate: boolean;
  /** Manager-specific keys, validated by the manager's own schema. */
  readonly options: Readonly<Record<string, unknown>>;
}

/**
 * Fully-resolved updater configuration. Built by the config loader and
 * treated as validated by everything downstream.
 */
export interface UpdaterConfig {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly dryRun: boolean;
  readonly timeoutMs: number;
  readonly parallelism: number;
  /** 0 disables the overall run deadline. */
  readonly runDeadlineMs: number;
  readonly sudo: SudoStrategy;
  readonly globalExclusions: readonly string[];
  readonly managers: readonly ManagerSettings[];
  /** Whether a human is attached to the terminal; decided by the entry point. */
  readonly interactive: boolean;
}
