import { ValidationError } from "../lib/errors.js";

export function requireText(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`Missing required argument: ${field}`);
  }
  return value.trim();
}

/** Integer in [min, max]; anything unparseable falls back. */
export function clampInt(value: unknown, fallback: number, min: number, max: number): number {
  const parsed =
    typeof value === "number" ? value : typeof value === "string" ? Number.parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(parsed)));
}
