#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { defaultConfigPaths, initConfigFile, loadConfig, validateConfigFile } from "./config/loader.js";
import type { ConfigResult } from "./config/loader.js";
import { createUpdater } from "./app.js";
import type { Updater } from "./app.js";
import { renderReport, renderReportJson } from "./report/render.js";
import { exitCodeFor } from "./report/status.js";
import { isUpdaterError } from "./shared/errors.js";
import type { RunReport } from "./types/report.js";

const program = new Command();

program
  .name("system-updater")
  .description("Update every package manager on this machine in one run")
  .version("0.3.0")
  .option("-c, --config <path>", "config file (default: ~/.config/system-updater/config.yaml)");

interface Session {
  loaded: ConfigResult;
  logger: Logger;
  updater: Updater;
}

function openSession(): Session {
  const globals = program.opts<{ config?: string }>();
  const interactive = Boolean(process.stdin.isTTY) && !process.env.CI;
  const loaded = loadConfig({ path: globals.config, interactive });
  const logger = createLogger({ level: loaded.config.logLevel, logFile: loaded.config.logFile });
  if (loaded.firstRun) {
    logger.info("No config file found; run `system-updater config --init` to create one");
  }
  return { loaded, logger, updater: createUpdater(loaded.config, { logger }) };
}

/** Abort the run on SIGINT/SIGTERM; the partial report is still printed. */
function interruptSignal(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals): void => {
    logger.warn({ signal: sig }, "Interrupted, cancelling run");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

function printReport(report: RunReport, options: { json?: boolean; verbose?: boolean }): void {
  if (options.json) {
    console.log(renderReportJson(report));
  } else {
    console.log(renderReport(report, { verbose: options.verbose, color: chalk.supportsColor !== false }));
  }
  process.exitCode = exitCodeFor(report.overallStatus);
}

function fail(err: unknown): never {
  if (isUpdaterError(err)) {
    console.error(chalk.red(`${err.code}: ${err.message}`));
  } else {
    console.error(chalk.red("Unexpected error:"), err);
  }
  process.exit(1);
}

// Status command
program
  .command("status")
  .description("Show outdated packages without changing anything")
  .option("-v, --verbose", "list every outdated package")
  .option("--json", "print the report as JSON")
  .action(async (options: { verbose?: boolean; json?: boolean }) => {
    try {
      const { logger, updater } = openSession();
      const interrupt = interruptSignal(logger);
      try {
        printReport(await updater.orchestrator.runStatus({ signal: interrupt.signal }), options);
      } finally {
        interrupt.dispose();
      }
    } catch (err) {
      fail(err);
    }
  });

// Update command
program
  .command("update")
  .description("Upgrade outdated packages, optionally only for the named managers")
  .argument("[managers...]", "manager ids to update (default: all enabled)")
  .option("-n, --dry-run", "show what would be updated without changing anything")
  .option("-v, --verbose", "list every package")
  .option("--json", "print the report as JSON")
  .action(async (managers: string[], options: { dryRun?: boolean; verbose?: boolean; json?: boolean }) => {
    try {
      const { loaded, logger, updater } = openSession();
      const interrupt = interruptSignal(logger);
      try {
        const report = await updater.orchestrator.runUpdate({
          managers,
          dryRun: options.dryRun ?? loaded.config.dryRun,
          signal: interrupt.signal,
        });
        printReport(report, options);
      } finally {
        interrupt.dispose();
      }
    } catch (err) {
      fail(err);
    }
  });

// List command
program
  .command("list")
  .description("List configured package managers and whether they are installed")
  .option("--json", "print as JSON")
  .action(async (options: { json?: boolean }) => {
    try {
      const { updater } = openSession();
      const listing = await updater.orchestrator.listManagers();
      if (options.json) {
        console.log(JSON.stringify(listing, null, 2));
        return;
      }
      const width = Math.max(0, ...listing.map((m) => m.id.length));
      for (const m of listing) {
        const available = m.available ? chalk.green("available") : chalk.gray("not installed");
        const enabled = m.enabled ? "" : chalk.yellow(" (disabled)");
        console.log(`  ${m.id.padEnd(width)}  ${available}${enabled}`);
      }
    } catch (err) {
      fail(err);
    }
  });

// Config command
program
  .command("config")
  .description("Create or validate the config file")
  .option("--init", "write the default config file")
  .option("--force", "overwrite an existing file with --init")
  .option("--validate", "check the config file and report problems")
  .action((options: { init?: boolean; force?: boolean; validate?: boolean }) => {
    const globals = program.opts<{ config?: string }>();
    const path = globals.config ?? process.env.SYSTEM_UPDATER_CONFIG ?? defaultConfigPaths()[0] ?? "config.yaml";
    try {
      if (options.init) {
        initConfigFile(path, options.force ?? false);
        console.log(chalk.green(`Wrote default config to ${path}`));
        return;
      }
      if (options.validate) {
        const problems = validateConfigFile(path);
        if (problems.length === 0) {
          console.log(chalk.green(`${path} is valid`));
          return;
        }
        console.error(chalk.red(`Configuration errors in ${path}:`));
        for (const problem of problems) console.error(chalk.red(`  • ${problem}`));
        process.exit(1);
      }
      console.log(path);
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync(process.argv).catch(fail);
