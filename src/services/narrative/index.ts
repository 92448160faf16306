import type { CoverboardConfig } from "../../lib/config.js";
import { ConfigurationError } from "../../lib/errors.js";
import type { FetchLike } from "../../lib/http.js";
import { OllamaProvider } from "./ollama.js";
import { OpenAIProvider } from "./openai.js";
import type { NarrativeProvider } from "./types.js";

export type { NarrativeProvider } from "./types.js";

/**
 * OpenAI when a key is configured, else Ollama when a host is configured.
 */
export function getNarrativeProvider(
  config: CoverboardConfig["narrative"],
  fetchFn?: FetchLike
): NarrativeProvider {
  const { openai, ollama } = config;
  if (openai.api_key) {
    return new OpenAIProvider({
      apiKey: openai.api_key,
      model: openai.model,
      baseUrl: openai.base_url,
      fetchFn,
    });
  }
  if (ollama.host) {
    return new OllamaProvider({
      host: ollama.host,
      model: ollama.model,
      fetchFn,
    });
  }
  throw new ConfigurationError(
    "No LLM backend configured. Set OPENAI_API_KEY (and optional OPENAI_MODEL) " +
      "or set OLLAMA_HOST (and optional OLLAMA_MODEL)."
  );
}
