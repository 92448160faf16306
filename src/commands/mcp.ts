import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Command } from "commander";
import { createCoverboard } from "../app.js";
import { loadConfig } from "../lib/config.js";
import { log } from "../lib/logger.js";
import { createToolServer } from "../transport/tools.js";

export async function runMcp(): Promise<void> {
  const server = createToolServer(createCoverboard(loadConfig()));
  await server.connect(new StdioServerTransport());
  log("[mcp] Tool server ready on stdio");
}

export function registerMcpCommand(program: Command): void {
  program
    .command("mcp")
    .description("Serve the tools over stdio (JSON-RPC)")
    .action(async () => {
      await runMcp();
    });
}
