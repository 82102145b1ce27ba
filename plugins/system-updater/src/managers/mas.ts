import type { PackageInfo, UpdateResult } from "../types/package.js";
import { packageRef } from "../types/package.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import { BaseManager } from "./base.js";

export const MAS_ID = "mas";

// 497799835 Xcode (15.0 -> 15.1)
const OUTDATED_LINE = /^(\d+)\s+(.+?)\s+\(([^()]+?)\s+->\s+([^()]+?)\)$/;

/**
 * Parse `mas outdated`. The App Store id is the handle used to upgrade.
 * `mas` prints nothing both when everything is current and on some account
 * errors, exiting 0 either way; empty output is treated as nothing to do.
 */
export function parseMasOutdated(stdout: string): PackageInfo[] {
  const packages: PackageInfo[] = [];
  for (const rawLine of stdout.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("Warning:")) continue;
    const m = OUTDATED_LINE.exec(line);
    if (!m) {
      throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `Unrecognised mas outdated line: ${line}`);
    }
    const [, appId = "", name = "", current = "", latest = ""] = m;
    packages.push({ name, currentVersion: current, latestVersion: latest, manager: MAS_ID, requiresPrivilege: false, ref: appId });
  }
  return packages;
}

export class MasManager extends BaseManager {
  readonly id = MAS_ID;
  protected readonly binary = "mas";

  async checkUpdates(): Promise<PackageInfo[]> {
    const r = await this.adapter.runOrThrow({ argv: ["mas", "outdated"] });
    return parseMasOutdated(r.stdout);
  }

  async applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    return this.applyEach(candidates, dryRun, (pkg) => ({ argv: ["mas", "upgrade", packageRef(pkg)] }));
  }
}
