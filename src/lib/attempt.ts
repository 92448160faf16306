/**
 * Result of a fail-soft upstream call: either a value, or a miss with the
 * reason it was skipped. Fallback chains branch on `ok` instead of catching.
 */
export type Attempt<T> = { ok: true; value: T } | { ok: false; reason: string };

export function hit<T>(value: T): Attempt<T> {
  return { ok: true, value };
}

export function miss(reason: string): Attempt<never> {
  return { ok: false, reason };
}

export function valueOrNull<T>(attempt: Attempt<T>): T | null {
  return attempt.ok ? attempt.value : null;
}
