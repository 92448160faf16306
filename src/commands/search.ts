import { Command } from "commander";
import { createCoverboard } from "../app.js";
import { DEFAULT_LIMIT, type CoverSearchResponse } from "../covers/search.js";
import { loadConfig } from "../lib/config.js";
import { MAX_TOOL_LIMIT } from "../transport/tools.js";
import { requireText } from "../transport/validation.js";
import { joinQuery, normalizeFormat, normalizeLimit, parseCount } from "./options.js";

type SearchOptions = {
  limit?: number;
  debug?: boolean;
  format?: string;
};

export function formatCoversAsText(query: string, response: CoverSearchResponse): string {
  const lines: string[] = [];
  const { results, debug } = response;
  lines.push(`Found ${results.length} covers for "${query}".`);
  if (debug) {
    const forced = debug.routed.forced ? " (forced)" : "";
    lines.push(`Routed as ${debug.routed.kind} "${debug.routed.value}"${forced}.`);
    if (debug.artist) {
      lines.push(`Artist: ${debug.artist.name} (${debug.artist.id})`);
    }
  }
  results.forEach((result, index) => {
    const date = result.releaseDate ?? "Unknown";
    lines.push(`  ${index + 1}. ${result.artist} - ${result.releaseTitle} (${date})`);
    lines.push(`     ${result.coverUrl}`);
  });
  return lines.join("\n");
}

export function formatCoversAsJson(query: string, response: CoverSearchResponse): string {
  return JSON.stringify(
    {
      query,
      count: response.results.length,
      results: response.results,
      debug: response.debug,
    },
    null,
    2
  );
}

export async function runSearch(words: string[], options: SearchOptions): Promise<void> {
  const query = requireText(joinQuery(words), "query");
  const limit = normalizeLimit(options.limit, DEFAULT_LIMIT, MAX_TOOL_LIMIT);
  const format = normalizeFormat(options.format);

  const coverboard = createCoverboard(loadConfig());
  const response = await coverboard.searchCoverArt(query, limit, options.debug ?? false);

  console.log(
    format === "json" ? formatCoversAsJson(query, response) : formatCoversAsText(query, response)
  );
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search")
    .description("Find album covers for a free-form query")
    .argument("<query...>", "Query, e.g. \"by metallica\" or \"death metal covers\"")
    .option(
      "--limit <count>",
      `Maximum covers (default: ${DEFAULT_LIMIT})`,
      parseCount,
      DEFAULT_LIMIT
    )
    .option("--debug", "Include the routing decision and chosen artist")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (words: string[], options: SearchOptions) => {
      await runSearch(words, options);
    });
}
