export type OutputFormat = "text" | "json";

export function normalizeFormat(value: string | undefined): OutputFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new Error("Unsupported format. Use text or json.");
}

export function normalizeLimit(value: number | undefined, fallback: number, max: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.min(Math.floor(value), max);
}

export function parseCount(value: string): number {
  return Number.parseInt(value, 10);
}

export function joinQuery(words: string[]): string {
  return words.join(" ").trim();
}
