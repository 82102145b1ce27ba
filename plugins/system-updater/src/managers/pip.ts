import { z } from "zod";
import type { PackageInfo, UpdateResult } from "../types/package.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import { BaseManager } from "./base.js";
import type { ManagerContext } from "./contract.js";

export const PIP_ID = "pip";

export const pipOptionsSchema = z.object({
  binary: z.string().min(1).default("pip3"),
});
export type PipOptions = z.infer<typeof pipOptionsSchema>;

const outdatedSchema = z.array(
  z.object({
    name: z.string().min(1),
    version: z.string(),
    latest_version: z.string(),
  }),
);

/** Parse `pip list --outdated --format=json`. */
export function parsePipOutdated(stdout: string): PackageInfo[] {
  if (!stdout.trim()) return [];
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, "pip list produced output that is not JSON", {
      stdout: stdout.slice(0, 500),
    });
  }
  const parsed = outdatedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpdaterError(UpdaterErrorCode.INVOCATION_FAILED, `Unexpected pip list JSON: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return parsed.data.map((p) => ({
    name: p.name,
    currentVersion: p.version,
    latestVersion: p.latest_version,
    manager: PIP_ID,
    requiresPrivilege: false,
  }));
}

export class PipManager extends BaseManager {
  readonly id = PIP_ID;
  protected readonly binary: string;

  constructor(ctx: ManagerContext, options: PipOptions) {
    super(ctx);
    this.binary = options.binary;
  }

  async checkUpdates(): Promise<PackageInfo[]> {
    const r = await this.adapter.runOrThrow({
      argv: [this.binary, "list", "--outdated", "--user", "--format=json", "--disable-pip-version-check"],
    });
    return parsePipOutdated(r.stdout);
  }

  async applyUpdates(candidates: readonly PackageInfo[], dryRun: boolean): Promise<UpdateResult> {
    return this.applyEach(candidates, dryRun, (pkg) => ({
      argv: [this.binary, "install", "--user", "--upgrade", pkg.name],
    }));
  }

  async selfUpdate(): Promise<void> {
    await this.adapter.runOrThrow({ argv: [this.binary, "install", "--user", "--upgrade", "pip"] }, { mutating: true });
  }
}
