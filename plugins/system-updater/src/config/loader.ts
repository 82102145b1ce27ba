// Config loader: reads ~/.config/system-updater/config.yaml (or ~/.system-updater.yaml)
// and deep-merges it over the built-in defaults, then validates the result.
// deepMerge lets users override only the keys they specify; unset keys inherit defaults.
// Manager blocks run in the order the user declares them, followed by any
// default managers the user did not mention.
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { Logger } from "pino";
import { KNOWN_MANAGERS, isKnownManager } from "../managers/factory.js";
import { UpdaterError, UpdaterErrorCode, isUpdaterError } from "../shared/errors.js";
import type { ManagerSettings, UpdaterConfig } from "../types/config.js";
import type { SudoStrategy } from "../types/sudo.js";
import { COMMON_MANAGER_KEYS, configFileSchema } from "./schema.js";
import type { ConfigFile } from "./schema.js";

export const CONFIG_ENV_VAR = "SYSTEM_UPDATER_CONFIG";

/** Default config YAML, written by `config --init`. All values shown are defaults. */
const DEFAULT_CONFIG_YAML = `# System Updater configuration
# All values shown are defaults. Remove a key to inherit its default.

# debug | info | warn | error (LOG_LEVEL overrides)
log_level: info
# Append-only JSON log; null logs to stderr only.
log_file: null

dry_run: false
# Per external command.
timeout_seconds: 600
# Managers updated at once; 1 runs them one after another.
parallelism: 1
# Cancel the whole run after this long; 0 disables the deadline.
run_deadline_seconds: 0

sudo:
  # prompt | whitelist | passwordless | skip
  strategy: prompt
  # Command prefixes allowed under the whitelist strategy.
  whitelist: []

# Never updated, whatever the manager.
exclude_packages: []

# Run order follows declaration order.
managers:
  homebrew:
    enabled: true
    exclude_packages: []
    cleanup: true
    self_update: true
    casks_require_sudo: true
    greedy: false
  mas:
    enabled: true
    exclude_packages: []
  npm:
    enabled: true
    exclude_packages: []
    self_update: true
  pip:
    enabled: true
    exclude_packages: []
    self_update: true
    binary: pip3
  gem:
    enabled: true
    exclude_packages: []
    cleanup: true
    self_update: true
  tlmgr:
    enabled: true
    exclude_packages: []
    self_update: true
    require_sudo: true
`;

export interface ConfigResult {
  config: UpdaterConfig;
  /** The file that was read, or null when running on built-in defaults. */
  configPath: string | null;
  firstRun: boolean;
}

export interface LoadConfigOptions {
  /** Explicit path (`--config`); takes precedence over the environment. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
  /** Whether a human is attached to the terminal; decided by the entry point. */
  interactive?: boolean;
  logger?: Logger;
}

export function renderDefaultConfig(): string {
  return DEFAULT_CONFIG_YAML;
}

/** Paths searched, in order, when no explicit path is given. */
export function defaultConfigPaths(home: string = homedir()): string[] {
  return [join(home, ".config", "system-updater", "config.yaml"), join(home, ".system-updater.yaml")];
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const interactive = options.interactive ?? false;
  const explicit = options.path ?? env[CONFIG_ENV_VAR];

  if (explicit) {
    if (!existsSync(explicit)) {
      throw new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, `Config file not found: ${explicit}`, { configPath: explicit });
    }
    return { config: parseConfig(readFileSync(explicit, "utf-8"), { home, interactive, source: explicit }), configPath: explicit, firstRun: false };
  }

  const found = defaultConfigPaths(home).find((p) => existsSync(p));
  if (!found) {
    options.logger?.info("No config file found, using built-in defaults");
    return { config: parseConfig("", { home, interactive, source: "defaults" }), configPath: null, firstRun: true };
  }
  options.logger?.debug({ configPath: found }, "Loading configuration");
  return { config: parseConfig(readFileSync(found, "utf-8"), { home, interactive, source: found }), configPath: found, firstRun: false };
}

export interface ParseConfigOptions {
  home?: string;
  interactive?: boolean;
  /** Named in error messages. */
  source?: string;
}

/** Parse, merge over defaults, and validate a YAML document into an UpdaterConfig. */
export function parseConfig(text: string, options: ParseConfigOptions = {}): UpdaterConfig {
  const source = options.source ?? "config";
  const user = readYamlObject(text, source);

  const userManagers = isPlainObject(user["managers"]) ? user["managers"] : {};
  const unknown = Object.keys(userManagers).filter((id) => !isKnownManager(id));
  if (unknown.length > 0) {
    throw new UpdaterError(UpdaterErrorCode.NOT_FOUND, `${source}: unknown manager(s): ${unknown.join(", ")}`, {
      unknown,
      known: KNOWN_MANAGERS,
    });
  }

  const merged = deepMerge(defaults(), user);
  const result = configFileSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, `${source}: ${issues.join("; ")}`, { issues });
  }

  const order = [...Object.keys(userManagers), ...Object.keys(result.data.managers).filter((id) => !(id in userManagers))];
  return toUpdaterConfig(result.data, order, options.home ?? homedir(), options.interactive ?? false);
}

/** Validate a config file without building anything. Returns the problems found, empty when valid. */
export function validateConfigFile(path: string): string[] {
  if (!existsSync(path)) return [`Config file not found: ${path}`];
  try {
    parseConfig(readFileSync(path, "utf-8"), { source: path });
    return [];
  } catch (err) {
    if (isUpdaterError(err)) {
      const issues = err.context?.["issues"];
      if (Array.isArray(issues)) return issues.map(String);
      return [err.message];
    }
    throw err;
  }
}

/** Write the default config to `path`. Refuses to overwrite unless `force` is set. */
export function initConfigFile(path: string, force = false): void {
  if (existsSync(path) && !force) {
    throw new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, `Config file already exists: ${path} (use --force to overwrite)`, {
      configPath: path,
    });
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, DEFAULT_CONFIG_YAML, "utf-8");
}

function defaults(): Record<string, unknown> {
  const parsed: unknown = parseYaml(DEFAULT_CONFIG_YAML);
  if (!isPlainObject(parsed)) throw new Error("built-in default config is not a mapping");
  return parsed;
}

function readYamlObject(text: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, `${source}: invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, `${source}: top level must be a mapping`);
  }
  return parsed;
}

function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

function toSudoStrategy(sudo: ConfigFile["sudo"]): SudoStrategy {
  switch (sudo.strategy) {
    case "prompt":
      return { kind: "prompt" };
    case "whitelist":
      return { kind: "whitelist", prefixes: sudo.whitelist };
    case "passwordless":
      return { kind: "passwordless" };
    case "skip":
      return { kind: "skip" };
  }
}

function toUpdaterConfig(file: ConfigFile, order: readonly string[], home: string, interactive: boolean): UpdaterConfig {
  const managers: ManagerSettings[] = [];
  for (const id of order) {
    const block = file.managers[id];
    const options: Record<string, unknown> = {};
    if (block) {
      for (const [key, value] of Object.entries(block)) {
        if (!COMMON_MANAGER_KEYS.some((k) => k === key)) options[key] = value;
      }
    }
    managers.push({
      id,
      enabled: block?.enabled ?? true,
      exclusions: block?.exclude_packages ?? [],
      cleanup: block?.cleanup ?? true,
      selfUpdate: block?.self_update ?? true,
      options,
    });
  }

  return {
    logLevel: file.log_level,
    logFile: file.log_file ? expandHome(file.log_file, home) : null,
    dryRun: file.dry_run,
    timeoutMs: Math.round(file.timeout_seconds * 1000),
    parallelism: file.parallelism,
    runDeadlineMs: Math.round(file.run_deadline_seconds * 1000),
    sudo: toSudoStrategy(file.sudo),
    globalExclusions: file.exclude_packages,
    managers,
    interactive,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
