import type { RoutedQuery } from "./types.js";

/**
 * Known genre/tag phrases, most specific first so "death metal covers"
 * routes to "death metal" rather than "metal".
 */
export const GENRES = [
  "death metal",
  "black metal",
  "thrash metal",
  "doom metal",
  "hip hop",
  "electronic",
  "classical",
  "metal",
  "rock",
  "punk",
  "jazz",
  "pop",
] as const;

const EXPLICIT_ARTIST = /\b(?:from|by)\s+([\p{L}\p{N} .'-]+)$/u;
const COVERS_INTENT = /\b(?:covers|bands?)\b/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const GENRE_PATTERNS = GENRES.map((genre) => ({
  genre,
  pattern: new RegExp(`\\b${escapeRegExp(genre)}\\b`),
}));

export function findGenre(text: string): string | null {
  const match = GENRE_PATTERNS.find(({ pattern }) => pattern.test(text));
  return match ? match.genre : null;
}

/**
 * Classify a free-text query. Total: anything unrecognised is an artist name.
 *
 * "by metallica"       → artist "metallica" (forced)
 * "death metal covers" → tag "death metal" (forced)
 * "jazz"               → tag "jazz"
 * "Radiohead"          → artist "Radiohead"
 */
export function route(text: string): RoutedQuery {
  const lowered = text.trim().toLowerCase();

  const explicit = EXPLICIT_ARTIST.exec(lowered);
  const name = explicit?.[1]?.trim();
  if (name) {
    return { kind: "artist", value: name, forced: true };
  }

  const genre = findGenre(lowered);
  if (genre) {
    return { kind: "tag", value: genre, forced: COVERS_INTENT.test(lowered) };
  }

  return { kind: "artist", value: text, forced: false };
}
