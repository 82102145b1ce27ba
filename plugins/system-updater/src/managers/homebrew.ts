import { z } from "zod";
import type { PackageInfo, UpdateResult } from "../types/package.js";
import { packageRef } from "../types/package.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import { BaseManager } from "./base.js";
import type { ManagerContext } from "./contract.js";

export const HOMEBREW_ID = "homebrew";
export const CASK_UPGRADE_PREFIX = ["brew", "upgrade", "--cask"] as const;

export const homebrewOptionsSchema = z.object({
  /** Cask upgrades can run installers that ask for an administrator password. */
  casks_require_sudo: z.boolean().default(true),
  /** Include casks that auto-update themselves. */
  greedy: z.boolean().default(false),
});
export type HomebrewOptions = z.infer<typeof homebrewOptionsSchema>;

const versions = z.union([z.array(z.string()), z.string()]);

const outdatedSchema = z.object({
  formulae: z
    .array(
      z.object({
        name: z.string().min(1),
        installed_versions: z.array(z.string()),
        current_version: z.string(),
        pinned: z.boolean().optional(),
      }),
    )
    .default([]),
  casks: z
    .array(
      z.object({
        name: z.string().min(1),
        installed_versions: versions,
        current_version: z.string(),
      }),
    )
    .default([]),
});

function lastVersion(v: string[] | string): string {
  if (typeof v === "string") return v;
  return v[v.length - 1] ?? "";
}

/** Parse `brew outdated --json=v2`. Pinned formulae are left out: brew will not upgrade them. */
export function parseBrewOutdated(stdout: string, casksRequireSudo: boolean): PackageInfo[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "brew outdated produced output that is not JSON", {
      stdout: stdout.slice(0, 500),
    });
  }
  const parsed = outdatedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `Unexpected brew outdated JSON: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }

  const formulae: PackageInfo[] = parsed.data.formulae
    .filter((f) => !f.pinned)
    .map((f) => ({
      name: f.name,
      currentVersion: lastVersion(f.installed_versions),
      latestVersion: f.current_version,
      manager: HOMEBREW_ID,
      requiresPrivilege: false,
      ref: `formula/${f.name}`,
    }));
  const casks: PackageInfo[] = parsed.data.casks.map((c) => ({
    name: c.name,
    currentVersion: lastVersion(c.installed_versions),
    latestVersion: c.current_version,
    manager: HOMEBREW_ID,
    requiresPrivilege: casksRequireSudo,
    ref: `cask/${c.name}`,
    privilegedCommand: casksRequireSudo ? [...CASK_UPGRADE_PREFIX, c.name] : undefined,
  }));
  return [...formulae, ...casks];
}

export class HomebrewManager extends BaseManager {
  readonly id = HOMEBREW_ID;
  protected readonly binary = "brew";

  constructor(ctx: ManagerContext, private readonly options: HomebrewOptions) {
    super(ctx);
  }

  async checkUpdates(): Promise<PackageInfo[]> {
    const argv = ["brew", "outdated", "--json=v2"];
    if (this.options.greedy) argv.push("--greedy");
    const r = await this.adapter.runOrThrow({ argv, env: { HOMEBREW_NO_AUTO_UPDATE: "1" } });
    return parseBrewOutdated(r.stdout, this.options.casks_require_sudo);
  }

  async applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    return this.applyEach(candidates, dryRun, (pkg) => {
      const kind = packageRef(pkg).startsWith("cask/") ? "--cask" : "--formula";
      return { argv: ["brew", "upgrade", kind, pkg.name], env: { HOMEBREW_NO_AUTO_UPDATE: "1" } };
    });
  }

  async cleanup(): Promise<void> {
    await this.adapter.runOrThrow({ argv: ["brew", "cleanup"] }, { mutating: true });
  }

  async selfUpdate(): Promise<void> {
    await this.adapter.runOrThrow({ argv: ["brew", "update"] }, { mutating: true });
  }
}
