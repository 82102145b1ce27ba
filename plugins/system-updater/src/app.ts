// Composition root: builds the adapter, negotiator, registry and orchestrator
// from a resolved config. Both entry points (CLI and MCP server) go through here.
import type { Logger } from "pino";
import { ExecutionAdapter } from "./execution/adapter.js";
import { ExecaExecutor } from "./execution/executor.js";
import type { Executor } from "./execution/executor.js";
import { createManager } from "./managers/factory.js";
import { ManagerRegistry } from "./registry/manager-registry.js";
import { SudoNegotiator } from "./sudo/negotiator.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import type { UpdaterConfig } from "./types/config.js";

export interface UpdaterDeps {
  logger: Logger;
  /** Defaults to spawning real processes through execa. */
  executor?: Executor;
}

export interface Updater {
  readonly orchestrator: Orchestrator;
  readonly registry: ManagerRegistry;
  readonly negotiator: SudoNegotiator;
}

export function createUpdater(config: UpdaterConfig, deps: UpdaterDeps): Updater {
  const { logger } = deps;
  const adapter = new ExecutionAdapter(deps.executor ?? new ExecaExecutor(), logger, config.timeoutMs);
  const negotiator = new SudoNegotiator({ strategy: config.sudo, interactive: config.interactive, adapter, logger });

  const registry = new ManagerRegistry();
  for (const settings of config.managers) {
    const manager = createManager(settings.id, settings.options, {
      adapter,
      logger: logger.child({ manager: settings.id }),
    });
    registry.register(manager, {
      enabled: settings.enabled,
      exclusions: settings.exclusions,
      cleanup: settings.cleanup,
      selfUpdate: settings.selfUpdate,
    });
  }

  const orchestrator = new Orchestrator({
    registry,
    negotiator,
    adapter,
    logger,
    policy: {
      globalExclusions: config.globalExclusions,
      parallelism: config.parallelism,
      runDeadlineMs: config.runDeadlineMs,
    },
  });
  logger.debug({ managers: registry.ids(), parallelism: config.parallelism, sudo: config.sudo.kind }, "Updater ready");
  return { orchestrator, registry, negotiator };
}
