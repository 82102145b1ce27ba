import { z } from "zod";
import type { Command } from "../types/command.js";
import type { PackageInfo, UpdateResult } from "../types/package.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import { BaseManager } from "./base.js";
import type { ManagerContext } from "./contract.js";

export const TLMGR_ID = "tlmgr";
export const TLMGR_UPDATE_PREFIX = ["tlmgr", "update"] as const;

export const tlmgrOptionsSchema = z.object({
  /** System-wide TeX installations are owned by root. */
  require_sudo: z.boolean().default(true),
});
export type TlmgrOptions = z.infer<typeof tlmgrOptionsSchema>;

function field(value: string | undefined): string | undefined {
  return value === undefined || value === "" || value === "-" ? undefined : value;
}

/**
 * Parse `tlmgr update --list --machine-readable`.
 *
 * After the `end-of-header` line each record is tab separated:
 * name, flag, local rev, server rev, size, runtime, estimated total, tag,
 * local catalogue version, remote catalogue version. Only flag `u` is an
 * update of an installed package; `__`-prefixed names are tlmgr internals.
 */
export function parseTlmgrUpdates(stdout: string, requireSudo: boolean): PackageInfo[] {
  const lines = stdout.split("\n").map((l) => l.replace(/\r$/, ""));
  const headerEnd = lines.indexOf("end-of-header");
  if (headerEnd === -1) {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "tlmgr output is missing end-of-header");
  }

  const packages: PackageInfo[] = [];
  for (const line of lines.slice(headerEnd + 1)) {
    if (line === "end-of-updates") break;
    if (!line.trim()) continue;
    const cols = line.split("\t");
    const [name, flag, localRev, serverRev] = cols;
    if (!name || !flag) {
      throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `Unrecognised tlmgr update line: ${line}`);
    }
    if (flag !== "u" || name.startsWith("__")) continue;
    packages.push({
      name,
      currentVersion: field(cols[8]) ?? field(localRev) ?? "unknown",
      latestVersion: field(cols[9]) ?? field(serverRev) ?? "unknown",
      manager: TLMGR_ID,
      requiresPrivilege: requireSudo,
      privilegedCommand: requireSudo ? [...TLMGR_UPDATE_PREFIX, name] : undefined,
    });
  }
  return packages;
}

export class TlmgrManager extends BaseManager {
  readonly id = TLMGR_ID;
  protected readonly binary = "tlmgr";

  constructor(ctx: ManagerContext, private readonly options: TlmgrOptions) {
    super(ctx);
  }

  async checkUpdates(): Promise<PackageInfo[]> {
    const r = await this.adapter.runOrThrow({ argv: ["tlmgr", "update", "--list", "--machine-readable"] });
    return parseTlmgrUpdates(r.stdout, this.options.require_sudo);
  }

  async applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    return this.applyEach(candidates, dryRun, (pkg) => this.elevate([...TLMGR_UPDATE_PREFIX, pkg.name]));
  }

  get selfUpdatePrivilege(): readonly string[] | undefined {
    return this.options.require_sudo ? [...TLMGR_UPDATE_PREFIX, "--self"] : undefined;
  }

  async selfUpdate(): Promise<void> {
    await this.adapter.runOrThrow(this.elevate([...TLMGR_UPDATE_PREFIX, "--self"]), { mutating: true });
  }

  // Non-interactive sudo: the negotiator has already established credentials.
  private elevate(argv: string[]): Command {
    return { argv: this.options.require_sudo ? ["sudo", "-n", ...argv] : argv };
  }
}
