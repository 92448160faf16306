import { Command } from "commander";
import { createCoverboard } from "../app.js";
import { loadConfig } from "../lib/config.js";
import { MAX_TOOL_ITEMS } from "../transport/tools.js";
import { requireText } from "../transport/validation.js";
import { DEFAULT_MAX_ITEMS } from "../vibe/board.js";
import type { VibeBoard } from "../vibe/types.js";
import { joinQuery, normalizeFormat, normalizeLimit, parseCount } from "./options.js";

type VibeOptions = {
  maxItems?: number;
  debug?: boolean;
  format?: string;
};

export function formatBoardAsText(query: string, board: VibeBoard): string {
  if (board.groups.length === 0) {
    return `No covers could be analysed for "${query}".`;
  }
  const total = board.groups.reduce((sum, group) => sum + group.items.length, 0);
  const filled = board.groups.filter((group) => group.items.length > 0).length;
  const covers = total === 1 ? "cover" : "covers";
  const groups = filled === 1 ? "group" : "groups";
  const lines = [`Vibe board for "${query}": ${total} ${covers} in ${filled} ${groups}.`];
  for (const group of board.groups) {
    lines.push("", group.label, `  ${group.summary}`);
    for (const item of group.items) {
      lines.push(
        `  - ${item.title}: ${item.features.caption} [${item.features.paletteHex.join(" ")}]`
      );
    }
  }
  const misses = (board.debug ?? []).filter((entry) => !entry.hit);
  if (misses.length > 0) {
    lines.push("", `Skipped ${misses.length}:`);
    for (const entry of misses) {
      lines.push(`  - ${entry.title} (${entry.reason ?? "unknown"})`);
    }
  }
  return lines.join("\n");
}

export async function runVibe(words: string[], options: VibeOptions): Promise<void> {
  const query = requireText(joinQuery(words), "query");
  const maxItems = normalizeLimit(options.maxItems, DEFAULT_MAX_ITEMS, MAX_TOOL_ITEMS);
  const format = normalizeFormat(options.format);

  const coverboard = createCoverboard(loadConfig());
  const board = await coverboard.vibeBoard(query, maxItems, options.debug ?? false);

  console.log(
    format === "json"
      ? JSON.stringify({ query, ...board }, null, 2)
      : formatBoardAsText(query, board)
  );
}

export function registerVibeCommand(program: Command): void {
  program
    .command("vibe")
    .description("Group a query's covers into two mood groups by color")
    .argument("<query...>", "Query used to pick one artist")
    .option(
      "--max-items <count>",
      `Release groups to analyse (default: ${DEFAULT_MAX_ITEMS})`,
      parseCount,
      DEFAULT_MAX_ITEMS
    )
    .option("--debug", "Report per-release hits and misses")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (words: string[], options: VibeOptions) => {
      await runVibe(words, options);
    });
}
