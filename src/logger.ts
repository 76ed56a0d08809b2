/**
 * Diagnostics on stderr, so they never mix with table or JSON output.
 */

let verbose = process.env.VISITSTATS_DEBUG === "1";

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function debug(message: string): void {
  if (verbose) console.error(`[debug] ${message}`);
}

export function warn(message: string): void {
  console.error(`warning: ${message}`);
}
