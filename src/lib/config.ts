import fs from "fs";
import yaml from "yaml";
import { defaultConfigPath, expandHome } from "./paths.js";

export type CoverboardConfig = {
  musicbrainz: {
    base_url: string;
    user_agent: string;
    timeout_ms: number;
  };
  cover_art: {
    base_url: string;
    timeout_ms: number;
    image_timeout_ms: number;
  };
  itunes: {
    base_url: string;
    timeout_ms: number;
  };
  search: {
    include_singles: boolean;
  };
  narrative: {
    openai: {
      api_key: string;
      model: string;
      base_url: string;
    };
    ollama: {
      host: string;
      model: string;
    };
  };
  server: {
    host: string;
    port: number;
  };
};

type PartialConfig = {
  [K in keyof CoverboardConfig]?: Partial<CoverboardConfig[K]>;
};

export const DEFAULT_CONFIG: CoverboardConfig = {
  musicbrainz: {
    base_url: "https://musicbrainz.org/ws/2",
    user_agent: "coverboard/0.1 (contact@example.com)",
    timeout_ms: 20000,
  },
  cover_art: {
    base_url: "https://coverartarchive.org",
    timeout_ms: 12000,
    image_timeout_ms: 15000,
  },
  itunes: {
    base_url: "https://itunes.apple.com/search",
    timeout_ms: 8000,
  },
  search: {
    include_singles: false,
  },
  narrative: {
    openai: {
      api_key: "",
      model: "gpt-4o-mini",
      base_url: "https://api.openai.com/v1",
    },
    ollama: {
      host: "",
      model: "llama3.2",
    },
  },
  server: {
    host: "0.0.0.0",
    port: 8000,
  },
};

function readFileConfig(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};
  const parsed: unknown = yaml.parse(fs.readFileSync(configPath, "utf8"));
  if (!parsed || typeof parsed !== "object") return {};
  // Shape is checked field by field in pickString / pickNumber below.
  return parsed as PartialConfig;
}

function pickString(...values: (string | undefined)[]): string {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
  }
  return "";
}

function pickNumber(...values: (number | string | undefined)[]): number {
  for (const value of values) {
    const parsed = typeof value === "string" ? Number.parseInt(value, 10) : value;
    if (typeof parsed === "number" && Number.isFinite(parsed) && parsed > 0) return parsed;
  }
  return 0;
}

function pickBoolean(...values: (boolean | string | undefined)[]): boolean {
  for (const value of values) {
    if (typeof value === "boolean") return value;
    if (typeof value === "string" && value.length > 0) {
      return value === "1" || value.toLowerCase() === "true";
    }
  }
  return false;
}

/**
 * Defaults, then the YAML file, then environment variables.
 * Built once per process and passed by reference.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoverboardConfig {
  const configPath = expandHome(env.COVERBOARD_CONFIG_PATH ?? defaultConfigPath());
  const file = readFileConfig(configPath);
  const d = DEFAULT_CONFIG;

  return {
    musicbrainz: {
      base_url: pickString(file.musicbrainz?.base_url, d.musicbrainz.base_url),
      user_agent: pickString(
        env.MB_USER_AGENT,
        file.musicbrainz?.user_agent,
        d.musicbrainz.user_agent
      ),
      timeout_ms: pickNumber(file.musicbrainz?.timeout_ms, d.musicbrainz.timeout_ms),
    },
    cover_art: {
      base_url: pickString(file.cover_art?.base_url, d.cover_art.base_url),
      timeout_ms: pickNumber(file.cover_art?.timeout_ms, d.cover_art.timeout_ms),
      image_timeout_ms: pickNumber(
        file.cover_art?.image_timeout_ms,
        d.cover_art.image_timeout_ms
      ),
    },
    itunes: {
      base_url: pickString(file.itunes?.base_url, d.itunes.base_url),
      timeout_ms: pickNumber(file.itunes?.timeout_ms, d.itunes.timeout_ms),
    },
    search: {
      include_singles: pickBoolean(
        env.COVERBOARD_INCLUDE_SINGLES,
        file.search?.include_singles,
        d.search.include_singles
      ),
    },
    narrative: {
      openai: {
        api_key: pickString(env.OPENAI_API_KEY, file.narrative?.openai?.api_key),
        model: pickString(
          env.OPENAI_MODEL,
          file.narrative?.openai?.model,
          d.narrative.openai.model
        ),
        base_url: pickString(file.narrative?.openai?.base_url, d.narrative.openai.base_url),
      },
      ollama: {
        host: pickString(env.OLLAMA_HOST, file.narrative?.ollama?.host),
        model: pickString(
          env.OLLAMA_MODEL,
          file.narrative?.ollama?.model,
          d.narrative.ollama.model
        ),
      },
    },
    server: {
      host: pickString(file.server?.host, d.server.host),
      port: pickNumber(env.PORT, file.server?.port, d.server.port),
    },
  };
}
