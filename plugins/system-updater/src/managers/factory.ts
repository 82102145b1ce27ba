// Manager factory: maps a configured id to its implementation.
// New ecosystems are added here and nowhere in the orchestrator.
import type { z } from "zod";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import type { ManagerContext, UpdateManager } from "./contract.js";
import { GemManager, GEM_ID } from "./gem.js";
import { HomebrewManager, HOMEBREW_ID, homebrewOptionsSchema } from "./homebrew.js";
import { MasManager, MAS_ID } from "./mas.js";
import { NpmManager, NPM_ID } from "./npm.js";
import { PipManager, PIP_ID, pipOptionsSchema } from "./pip.js";
import { TlmgrManager, TLMGR_ID, tlmgrOptionsSchema } from "./tlmgr.js";

/** Every manager id this build knows, in default run order. */
export const KNOWN_MANAGERS: readonly string[] = [HOMEBREW_ID, MAS_ID, NPM_ID, PIP_ID, GEM_ID, TLMGR_ID];

export function isKnownManager(id: string): boolean {
  return KNOWN_MANAGERS.includes(id);
}

function parseOptions<S extends z.ZodTypeAny>(id: string, schema: S, options: Readonly<Record<string, unknown>>): z.output<S> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new UpdaterError(UpdaterErrorCode.CONFIG_INVALID, `Invalid options for manager '${id}': ${issues}`, { manager: id });
  }
  return result.data;
}

export function createManager(id: string, options: Readonly<Record<string, unknown>>, ctx: ManagerContext): UpdateManager {
  switch (id) {
    case HOMEBREW_ID:
      return new HomebrewManager(ctx, parseOptions(id, homebrewOptionsSchema, options));
    case MAS_ID:
      return new MasManager(ctx);
    case NPM_ID:
      return new NpmManager(ctx);
    case PIP_ID:
      return new PipManager(ctx, parseOptions(id, pipOptionsSchema, options));
    case GEM_ID:
      return new GemManager(ctx);
    case TLMGR_ID:
      return new TlmgrManager(ctx, parseOptions(id, tlmgrOptionsSchema, options));
    default:
      throw new UpdaterError(UpdaterErrorCode.NOT_FOUND, `Unknown manager '${id}'`, { manager: id, known: KNOWN_MANAGERS });
  }
}
