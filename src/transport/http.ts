import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { Coverboard } from "../app.js";
import { DEFAULT_LIMIT } from "../covers/search.js";
import { errorMessage, ValidationError } from "../lib/errors.js";
import { log } from "../lib/logger.js";
import { createToolServer, MAX_TOOL_LIMIT } from "./tools.js";

const MISSING_QUERY = "Missing required argument: query";

const searchParams = z.object({
  query: z.string({ required_error: MISSING_QUERY }).trim().min(1, MISSING_QUERY),
  limit: z.coerce.number().int().min(1).max(MAX_TOOL_LIMIT).optional(),
  debug: z.enum(["0", "1", "true", "false"]).optional(),
});

function allowAnyOrigin(req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "*");
  if (req.method === "OPTIONS") {
    res.sendStatus(204);
    return;
  }
  next();
}

function sendValidationError(res: Response, error: ValidationError): void {
  res.status(400).json({ error: { code: error.code, message: error.message } });
}

export function createHttpApp(coverboard: Coverboard): Express {
  const app = express();
  app.use(allowAnyOrigin);

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/search", async (req, res) => {
    const parsed = searchParams.safeParse(req.query);
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? "Invalid arguments";
      sendValidationError(res, new ValidationError(message));
      return;
    }
    const { query, limit = DEFAULT_LIMIT } = parsed.data;
    const debug = parsed.data.debug === "1" || parsed.data.debug === "true";

    try {
      const data = await coverboard.searchCoverArt(query, limit, debug);
      res.json({
        query,
        routed: coverboard.route(query),
        results: data.results,
        ...(debug ? { debug: data.debug } : {}),
      });
    } catch (err) {
      log(`[http] /api/search failed: ${errorMessage(err)}`);
      res.status(500).json({ error: { message: errorMessage(err) } });
    }
  });

  app.get("/mcp", (_req, res) => {
    res.json({ ok: true, mcp: true, path: "/mcp" });
  });

  // Stateless: a fresh tool server and transport per JSON-RPC request.
  app.post("/mcp", express.json(), async (req, res) => {
    const server = createToolServer(coverboard);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        log(`[http] /mcp teardown failed: ${errorMessage(err)}`);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      log(`[http] /mcp failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  return app;
}
