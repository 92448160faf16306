import { defaultFetch, type FetchLike } from "../../lib/http.js";
import { isRecord, readRecords, readString } from "../../lib/json.js";
import { buildMessages } from "./prompt.js";
import type { NarrativeProvider } from "./types.js";

const TIMEOUT_MS = 60000;

export type OllamaProviderOptions = {
  host: string;
  model: string;
  fetchFn?: FetchLike;
};

/**
 * Reply text from /api/chat. Newer servers answer {message: {content}},
 * older ones {messages: [...]}.
 */
export function readOllamaReply(data: unknown): string {
  if (isRecord(data)) {
    const message = data.message;
    if (isRecord(message) && typeof message.content === "string") {
      return message.content.trim();
    }
    const messages = readRecords(data, "messages");
    const last = messages[messages.length - 1];
    if (last) {
      return (readString(last, "content") ?? "").trim();
    }
  }
  throw new Error("Unexpected Ollama response format");
}

export class OllamaProvider implements NarrativeProvider {
  readonly name = "ollama";
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: OllamaProviderOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  async summarize(boardJson: string, style: string): Promise<string> {
    const { host, model } = this.options;
    const response = await this.fetchFn(`${host.replace(/\/+$/, "")}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model,
        messages: buildMessages(boardJson, style),
        stream: false,
        options: { temperature: 0.7 },
      }),
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`Ollama API error: ${response.status} ${errorBody}`);
    }

    return readOllamaReply(await response.json());
  }
}
