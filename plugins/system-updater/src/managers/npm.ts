import { z } from "zod";
import type { PackageInfo, UpdateResult } from "../types/package.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import { BaseManager } from "./base.js";

export const NPM_ID = "npm";

const entrySchema = z.object({
  current: z.string().optional(),
  wanted: z.string().optional(),
  latest: z.string(),
});
const outdatedSchema = z.record(z.string(), z.unknown());

/**
 * Parse `npm outdated -g --json`: an object keyed by package name.
 * npm reports its own failures as `{ "error": { ... } }` on stdout.
 */
export function parseNpmOutdated(stdout: string): PackageInfo[] {
  if (!stdout.trim()) return [];
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "npm outdated produced output that is not JSON", {
      stdout: stdout.slice(0, 500),
    });
  }
  const top = outdatedSchema.safeParse(raw);
  if (!top.success) {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "Unexpected npm outdated JSON: expected an object");
  }
  if ("error" in top.data) {
    const detail = z.object({ summary: z.string() }).safeParse(top.data["error"]);
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `npm outdated reported an error: ${detail.success ? detail.data.summary : "unknown"}`);
  }

  const packages: PackageInfo[] = [];
  for (const [name, value] of Object.entries(top.data)) {
    const entry = entrySchema.safeParse(value);
    if (!entry.success) {
      throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `Unexpected npm outdated entry for ${name}`);
    }
    packages.push({
      name,
      currentVersion: entry.data.current ?? "missing",
      latestVersion: entry.data.latest,
      manager: NPM_ID,
      requiresPrivilege: false,
    });
  }
  return packages;
}

export class NpmManager extends BaseManager {
  readonly id = NPM_ID;
  protected readonly binary = "npm";

  async checkUpdates(): Promise<PackageInfo[]> {
    // Exit 1 means "updates exist", not failure.
    const r = await this.adapter.runOrThrow({ argv: ["npm", "outdated", "-g", "--json"] }, { okExitCodes: [0, 1] });
    return parseNpmOutdated(r.stdout);
  }

  async applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    return this.applyEach(candidates, dryRun, (pkg) => ({ argv: ["npm", "install", "-g", `${pkg.name}@latest`] }));
  }

  async selfUpdate(): Promise<void> {
    await this.adapter.runOrThrow({ argv: ["npm", "install", "-g", "npm@latest"] }, { mutating: true });
  }
}
