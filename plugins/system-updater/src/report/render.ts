import chalk from "chalk";
import type { ManagerOutcome, ManagerStatus } from "../types/package.js";
import type { OverallStatus, RunMode, RunReport } from "../types/report.js";

export interface RenderOptions {
  /** List every package, not only skipped and failed ones. */
  verbose?: boolean;
  color?: boolean;
}

type Status = ManagerStatus | OverallStatus;

function paint(c: chalk.Chalk, status: Status, width = 0): string {
  const text = status.padEnd(width);
  switch (status) {
    case "success":
    case "simulated":
      return c.green(text);
    case "partial_success":
    case "degraded":
      return c.yellow(text);
    case "failed":
    case "cancelled":
      return c.red(text);
    case "skipped":
    case "unavailable":
      return c.gray(text);
  }
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function summary(outcome: ManagerOutcome, mode: RunMode): string {
  if (outcome.note) return outcome.note;
  const parts: string[] = [];
  if (mode.kind === "status") {
    parts.push(`${outcome.candidates.length} outdated`);
  } else {
    parts.push(`${outcome.updated.length} ${mode.dryRun ? "to update" : "updated"}`);
    if (outcome.skipped.length > 0) parts.push(`${outcome.skipped.length} skipped`);
  }
  if (outcome.excluded.length > 0) parts.push(`${outcome.excluded.length} excluded`);
  if (outcome.errors.length > 0) parts.push(plural(outcome.errors.length, "error"));
  return parts.join(", ");
}

/** Plain-text report, one block per manager in registry order. */
export function renderReport(report: RunReport, options: RenderOptions = {}): string {
  const c = new chalk.Instance({ level: options.color ? 1 : 0 });
  const title = report.mode.kind === "status" ? "Status" : report.mode.dryRun ? "Update (dry run)" : "Update";
  const lines = [`${c.bold(title)}: ${paint(c, report.overallStatus)}`];

  const outcomes = [...report.results.values()];
  const idWidth = Math.max(0, ...outcomes.map((o) => o.manager.length));
  const statusWidth = Math.max(0, ...outcomes.map((o) => o.status.length));

  for (const outcome of outcomes) {
    let line = `  ${outcome.manager.padEnd(idWidth)}  ${paint(c, outcome.status, statusWidth)}  ${summary(outcome, report.mode)}`;
    if (options.verbose) line += c.dim(` (${(outcome.durationMs / 1000).toFixed(1)}s)`);
    lines.push(line);

    if (options.verbose) {
      const listed = report.mode.kind === "status" ? outcome.candidates : outcome.updated;
      for (const pkg of listed) {
        lines.push(`      ${pkg.name} ${pkg.currentVersion} -> ${pkg.latestVersion}`);
      }
      for (const pkg of outcome.excluded) {
        lines.push(c.dim(`      excluded ${pkg.name}`));
      }
    }
    for (const { package: pkg, reason } of outcome.skipped) {
      lines.push(c.yellow(`      skipped ${pkg.name}: ${reason}`));
    }
    for (const { step, reason } of outcome.maintenanceSkipped ?? []) {
      lines.push(c.yellow(`      skipped ${step}: ${reason}`));
    }
    for (const error of outcome.errors) {
      lines.push(c.red(`      error${error.step ? ` [${error.step}]` : ""}: ${error.message}`));
    }
  }

  if (report.notRun.length > 0) {
    lines.push(c.gray(`  not run: ${report.notRun.join(", ")}`));
  }
  return lines.join("\n");
}

/** Plain-object form of a report, with results as an ordered object. */
export function reportToJson(report: RunReport): Record<string, unknown> {
  return {
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    mode: report.mode,
    overallStatus: report.overallStatus,
    results: Object.fromEntries(report.results),
    notRun: report.notRun,
  };
}

export function renderReportJson(report: RunReport): string {
  return JSON.stringify(reportToJson(report), null, 2);
}
