// MCP tool definitions for the three updater operations. Each tool validates
// its own input with zod and always answers with a ToolResponse, never a throw.
import { z } from "zod";
import type { Logger } from "pino";
import type { Orchestrator } from "../orchestrator/orchestrator.js";
import { reportToJson } from "../report/render.js";
import { exitCodeFor } from "../report/status.js";
import { isUpdaterError } from "../shared/errors.js";
import type { ToolResponse } from "../types/response.js";

export interface UpdaterTool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly readOnly: boolean;
  readonly destructive: boolean;
  readonly inputShape: z.ZodRawShape;
  execute(args: unknown): Promise<ToolResponse>;
}

interface ToolSpec<S extends z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  readOnly: boolean;
  destructive: boolean;
  inputShape: S;
  run(input: z.objectOutputType<S, z.ZodTypeAny, "strip">): Promise<{ data: Record<string, unknown>; exitCode?: number }>;
}

function defineTool<S extends z.ZodRawShape>(spec: ToolSpec<S>, logger: Logger): UpdaterTool {
  const schema = z.object(spec.inputShape);
  return {
    name: spec.name,
    title: spec.title,
    description: spec.description,
    readOnly: spec.readOnly,
    destructive: spec.destructive,
    inputShape: spec.inputShape,
    async execute(args: unknown): Promise<ToolResponse> {
      const start = Date.now();
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        return {
          status: "error",
          tool: spec.name,
          duration_ms: Date.now() - start,
          error_code: "INVALID_INPUT",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
        };
      }
      try {
        const { data, exitCode } = await spec.run(parsed.data);
        return { status: "success", tool: spec.name, duration_ms: Date.now() - start, data, exit_code: exitCode };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ tool: spec.name, error: message }, "Tool execution error");
        return {
          status: "error",
          tool: spec.name,
          duration_ms: Date.now() - start,
          error_code: isUpdaterError(err) ? err.code : "INTERNAL_ERROR",
          message,
          context: isUpdaterError(err) ? err.context : undefined,
        };
      }
    },
  };
}

export function createUpdaterTools(orchestrator: Orchestrator, logger: Logger): UpdaterTool[] {
  return [
    defineTool(
      {
        name: "updater_status",
        title: "Check for updates",
        description: "List outdated packages for every enabled package manager. Changes nothing.",
        readOnly: true,
        destructive: false,
        inputShape: {},
        async run() {
          const report = await orchestrator.runStatus();
          return { data: reportToJson(report), exitCode: exitCodeFor(report.overallStatus) };
        },
      },
      logger,
    ),
    defineTool(
      {
        name: "updater_update",
        title: "Apply updates",
        description:
          "Upgrade outdated packages, optionally only for the named managers. Defaults to a dry run; pass dry_run=false to apply.",
        readOnly: false,
        destructive: true,
        inputShape: {
          managers: z.array(z.string().min(1)).optional().describe("Manager ids to update; all enabled managers when omitted"),
          dry_run: z.boolean().default(true).describe("Report what would be updated without changing anything"),
        },
        async run(input) {
          const report = await orchestrator.runUpdate({ managers: input.managers, dryRun: input.dry_run });
          return { data: reportToJson(report), exitCode: exitCodeFor(report.overallStatus) };
        },
      },
      logger,
    ),
    defineTool(
      {
        name: "updater_list_managers",
        title: "List package managers",
        description: "List configured package managers with their availability and enablement.",
        readOnly: true,
        destructive: false,
        inputShape: {},
        async run() {
          return { data: { managers: await orchestrator.listManagers() } };
        },
      },
      logger,
    ),
  ];
}
