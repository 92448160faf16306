#!/usr/bin/env node

import { Command } from "commander";
import { registerFetchCommand } from "./commands/fetch.js";
import { registerMcpCommand } from "./commands/mcp.js";
import { registerSearchCommand } from "./commands/search.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerSummarizeCommand } from "./commands/summarize.js";
import { registerVibeCommand } from "./commands/vibe.js";

const program = new Command();

program
  .name("coverboard")
  .description("Album cover search and color vibe boards from free-form queries")
  .version("0.1.0");

registerSearchCommand(program);
registerVibeCommand(program);
registerFetchCommand(program);
registerSummarizeCommand(program);
registerServeCommand(program);
registerMcpCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
