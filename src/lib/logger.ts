// Read once at load; COVERBOARD_QUIET=1 mutes all diagnostics.
const quiet = process.env.COVERBOARD_QUIET === "1";

/**
 * Progress and diagnostics go to stderr; stdout is reserved for command
 * output and the stdio tool transport.
 */
export function log(message: string): void {
  if (quiet) return;
  console.error(message);
}
