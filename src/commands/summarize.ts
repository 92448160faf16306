import { Command } from "commander";
import { createCoverboard } from "../app.js";
import { loadConfig } from "../lib/config.js";
import { MAX_TOOL_ITEMS } from "../transport/tools.js";
import { requireText } from "../transport/validation.js";
import { DEFAULT_MAX_ITEMS } from "../vibe/board.js";
import { joinQuery, normalizeFormat, normalizeLimit, parseCount } from "./options.js";

type SummarizeOptions = {
  style?: string;
  maxItems?: number;
  format?: string;
};

export async function runSummarize(words: string[], options: SummarizeOptions): Promise<void> {
  const query = requireText(joinQuery(words), "query");
  const maxItems = normalizeLimit(options.maxItems, DEFAULT_MAX_ITEMS, MAX_TOOL_ITEMS);
  const format = normalizeFormat(options.format);

  const coverboard = createCoverboard(loadConfig());
  const result = await coverboard.summarize(query, options.style ?? "", maxItems);

  if (format === "json") {
    console.log(
      JSON.stringify({ query, summary: result.summary, groups: result.board.groups }, null, 2)
    );
    return;
  }
  console.log(result.summary);
}

export function registerSummarizeCommand(program: Command): void {
  program
    .command("summarize")
    .description("Describe a query's vibe board in one paragraph (needs an LLM backend)")
    .argument("<query...>", "Query used to pick one artist")
    .option("--style <style>", "Writing style hint, e.g. \"noir\"")
    .option(
      "--max-items <count>",
      `Release groups to analyse (default: ${DEFAULT_MAX_ITEMS})`,
      parseCount,
      DEFAULT_MAX_ITEMS
    )
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (words: string[], options: SummarizeOptions) => {
      await runSummarize(words, options);
    });
}
