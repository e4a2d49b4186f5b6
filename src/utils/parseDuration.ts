/**
 * Converts a human-friendly duration string (e.g., "15s", "5m", "1h", "250ms")
 * into milliseconds. A bare number is taken as milliseconds.
 *
 * @param durationStr A string like "15s", "2 min", "1 hour" or "500"
 * @returns the duration in milliseconds, or null if invalid
 */
export function parseDuration(durationStr: string): number | null {
  const match = durationStr
    .trim()
    .match(/^(\d+(?:\.\d+)?)\s*(ms|h|hour|hours|m|min|minute|minutes|s|sec|second|seconds)?$/i);
  if (!match) return null;

  const value = parseFloat(match[1]);
  const unit = (match[2] ?? "ms").toLowerCase();

  if (["h", "hour", "hours"].includes(unit)) return value * 60 * 60 * 1000;
  if (["m", "min", "minute", "minutes"].includes(unit)) return value * 60 * 1000;
  if (["s", "sec", "second", "seconds"].includes(unit)) return value * 1000;
  return value;
}
