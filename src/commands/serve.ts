import { Command } from "commander";
import { createCoverboard } from "../app.js";
import { loadConfig } from "../lib/config.js";
import { log } from "../lib/logger.js";
import { createHttpApp } from "../transport/http.js";
import { parseCount } from "./options.js";

type ServeOptions = {
  host?: string;
  port?: number;
};

export async function runServe(options: ServeOptions): Promise<void> {
  const config = loadConfig();
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;
  const app = createHttpApp(createCoverboard(config));

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      log(`[serve] Listening on http://${host}:${port} (/api/search, /mcp)`);
    });
    server.on("error", reject);
    server.on("close", () => resolve());
  });
}

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Serve the HTTP query endpoint and the JSON-RPC tool server")
    .option("--host <host>", "Bind address (default: from config)")
    .option("--port <port>", "Port (default: $PORT or 8000)", parseCount)
    .action(async (options: ServeOptions) => {
      await runServe(options);
    });
}
