import { defaultFetch, type FetchLike } from "../../lib/http.js";
import { isRecord, readRecords, readString } from "../../lib/json.js";
import { buildMessages } from "./prompt.js";
import type { NarrativeProvider } from "./types.js";

const TIMEOUT_MS = 30000;

export type OpenAIProviderOptions = {
  apiKey: string;
  model: string;
  baseUrl: string;
  fetchFn?: FetchLike;
};

export class OpenAIProvider implements NarrativeProvider {
  readonly name = "openai";
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  async summarize(boardJson: string, style: string): Promise<string> {
    const { apiKey, model, baseUrl } = this.options;
    const response = await this.fetchFn(`${baseUrl.replace(/\/+$/, "")}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages: buildMessages(boardJson, style),
        temperature: 0.7,
        max_tokens: 220,
      }),
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${errorBody}`);
    }

    const data = await response.json();
    const [choice] = isRecord(data) ? readRecords(data, "choices") : [];
    const message = choice?.message;
    const text = isRecord(message) ? readString(message, "content") : undefined;
    if (!text) {
      throw new Error("Empty response from OpenAI");
    }
    return text.trim();
  }
}
