import { Command } from "commander";
import { createCoverboard } from "../app.js";
import { loadConfig } from "../lib/config.js";
import { requireText } from "../transport/validation.js";
import { normalizeFormat } from "./options.js";

type FetchOptions = {
  format?: string;
};

export async function runFetch(id: string, options: FetchOptions): Promise<void> {
  const format = normalizeFormat(options.format);
  const coverboard = createCoverboard(loadConfig());
  const doc = await coverboard.fetchReleaseGroup(requireText(id, "id"));
  console.log(format === "json" ? JSON.stringify(doc, null, 2) : doc.text);
}

export function registerFetchCommand(program: Command): void {
  program
    .command("fetch")
    .description("Show details for one release group")
    .argument("<id>", "Release group ID")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (id: string, options: FetchOptions) => {
      await runFetch(id, options);
    });
}
