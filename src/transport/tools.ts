import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Coverboard } from "../app.js";
import { errorMessage, ValidationError } from "../lib/errors.js";
import { log } from "../lib/logger.js";
import { DEFAULT_LIMIT } from "../covers/search.js";
import { DEFAULT_MAX_ITEMS } from "../vibe/board.js";
import { clampInt, requireText } from "./validation.js";

export const SERVER_INFO = { name: "coverboard", version: "0.1.0" };

export const MAX_TOOL_LIMIT = 50;
export const MAX_TOOL_ITEMS = 24;

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(value) }] };
}

async function runTool(name: string, fn: () => Promise<unknown>): Promise<ToolResult> {
  try {
    return jsonResult(await fn());
  } catch (err) {
    log(`[tools] ${name} failed: ${errorMessage(err)}`);
    const code = err instanceof ValidationError ? err.code : undefined;
    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify({ error: { ...(code !== undefined ? { code } : {}), message: errorMessage(err) } }),
        },
      ],
      isError: true,
    };
  }
}

/**
 * One tool server per transport connection. Every tool wraps a single
 * Coverboard operation and returns its result as a JSON string.
 */
export function createToolServer(coverboard: Coverboard): McpServer {
  const server = new McpServer(SERVER_INFO);

  server.tool(
    "search",
    "Search music release groups by query; returns {results: [{id, title, url}]}.",
    { query: z.string().describe("Free-form query like 'by metallica' or 'jazz'.") },
    async ({ query }) =>
      runTool("search", async () => {
        const hits = await coverboard.searchReleaseGroups(requireText(query, "query"));
        return { results: hits.map(({ id, title, url }) => ({ id, title, url })) };
      })
  );

  server.tool(
    "fetch",
    "Fetch full details for a release group by ID; returns {id, title, text, url, metadata}.",
    { id: z.string().describe("Release group ID from the search tool.") },
    async ({ id }) => runTool("fetch", () => coverboard.fetchReleaseGroup(requireText(id, "id")))
  );

  server.tool(
    "search_cover_art",
    "Return album covers for a free-form query (e.g., 'by metallica' or 'metal bands').",
    {
      query: z.string().describe("Free-form prompt like 'show me covers from metal bands'."),
      limit: z.number().int().min(1).max(MAX_TOOL_LIMIT).optional().describe("Max number of results to return."),
    },
    async ({ query, limit }) =>
      runTool("search_cover_art", async () => {
        const text = requireText(query, "query");
        const cap = clampInt(limit, DEFAULT_LIMIT, 1, MAX_TOOL_LIMIT);
        const { results } = await coverboard.searchCoverArt(text, cap);
        return results;
      })
  );

  server.tool(
    "vibe_board",
    "Group a query's album covers into two mood groups by color.",
    {
      query: z.string().describe("Free-form query used to pick one artist."),
      max_items: z.number().int().min(1).max(MAX_TOOL_ITEMS).optional(),
      debug: z.boolean().optional(),
    },
    async ({ query, max_items, debug }) =>
      runTool("vibe_board", () =>
        coverboard.vibeBoard(
          requireText(query, "query"),
          clampInt(max_items, DEFAULT_MAX_ITEMS, 1, MAX_TOOL_ITEMS),
          debug ?? false
        )
      )
  );

  server.tool(
    "rag_summarize",
    "Build a vibe board for a query and describe it in one paragraph.",
    {
      query: z.string().describe("Free-form query used to pick one artist."),
      style: z.string().optional().describe("Optional writing style, e.g. 'noir'."),
      max_items: z.number().int().min(1).max(MAX_TOOL_ITEMS).optional(),
    },
    async ({ query, style, max_items }) =>
      runTool("rag_summarize", async () => {
        const result = await coverboard.summarize(
          requireText(query, "query"),
          style ?? "",
          clampInt(max_items, DEFAULT_MAX_ITEMS, 1, MAX_TOOL_ITEMS)
        );
        return { query: result.query, summary: result.summary, groups: result.board.groups };
      })
  );

  return server;
}
