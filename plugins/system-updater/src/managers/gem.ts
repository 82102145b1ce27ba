import type { PackageInfo, UpdateResult } from "../types/package.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import { BaseManager } from "./base.js";

export const GEM_ID = "gem";

// rake (13.0.6 < 13.1.0)
const OUTDATED_LINE = /^(\S+) \((\S+) < (\S+)\)$/;

/**
 * Parse `gem outdated`. Like mas, gem exits 0 with empty output both when
 * nothing is outdated and when the remote index could not be fetched.
 */
export function parseGemOutdated(stdout: string): PackageInfo[] {
  const packages: PackageInfo[] = [];
  for (const rawLine of stdout.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;
    const m = OUTDATED_LINE.exec(line);
    if (!m) {
      throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `Unrecognised gem outdated line: ${line}`);
    }
    const [, name = "", current = "", latest = ""] = m;
    packages.push({ name, currentVersion: current, latestVersion: latest, manager: GEM_ID, requiresPrivilege: false });
  }
  return packages;
}

export class GemManager extends BaseManager {
  readonly id = GEM_ID;
  protected readonly binary = "gem";

  async checkUpdates(): Promise<PackageInfo[]> {
    const r = await this.adapter.runOrThrow({ argv: ["gem", "outdated"] });
    return parseGemOutdated(r.stdout);
  }

  async applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    return this.applyEach(candidates, dryRun, (pkg) => ({ argv: ["gem", "update", "--user-install", pkg.name] }));
  }

  async cleanup(): Promise<void> {
    await this.adapter.runOrThrow({ argv: ["gem", "cleanup"] }, { mutating: true });
  }

  async selfUpdate(): Promise<void> {
    await this.adapter.runOrThrow({ argv: ["gem", "update", "--system", "--user-install"] }, { mutating: true });
  }
}
