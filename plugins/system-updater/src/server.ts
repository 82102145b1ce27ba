#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createLogger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { createUpdater } from "./app.js";
import { createUpdaterTools } from "./tools/updater-tools.js";

const SERVER_VERSION = "0.3.0";

async function main(): Promise<void> {
  // stdout carries the protocol; the logger writes to stderr only.
  const bootLogger = createLogger();

  // ── Phase 1: Load config ──────────────────────────────────────
  // No terminal is attached to an MCP server, so credential prompts are never possible.
  const { config, configPath, firstRun } = loadConfig({ interactive: false, logger: bootLogger });
  const logger = createLogger({ level: config.logLevel, logFile: config.logFile, name: "system-updater-mcp" });
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Build the updater and its tools ──────────────────
  const { orchestrator, registry } = createUpdater(config, { logger });
  const tools = createUpdaterTools(orchestrator, logger);

  // ── Phase 3: Register tools on MCP server ─────────────────────
  const server = new McpServer({ name: "system-updater", version: SERVER_VERSION });
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputShape,
        annotations: {
          readOnlyHint: tool.readOnly,
          destructiveHint: tool.destructive,
          idempotentHint: tool.readOnly,
          openWorldHint: true,
        },
      },
      async (args: Record<string, unknown>) => {
        const response = await tool.execute(args);
        return {
          content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          isError: response.status === "error",
        };
      },
    );
  }

  // ── Phase 4: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: tools.length, managers: registry.ids() }, "system-updater MCP server running on stdio");
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal startup error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
