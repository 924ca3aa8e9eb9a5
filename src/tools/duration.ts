export const MAX_INTERVAL_SECONDS = 10 * 3600;

const UNIT_SECONDS: Record<string, number> = {
  h: 3600,
  hr: 3600,
  hour: 3600,
  m: 60,
  min: 60,
  minute: 60,
  s: 1,
  sec: 1,
  second: 1
};

const UNIT_PATTERN = /(\d+(?:\.\d+)?)\s*(hours?|hrs?|h|minutes?|mins?|m|seconds?|secs?|s)\b/g;

/**
 * Parses `"90"`, `"01:30"`, `"1:02:03"` or unit phrases such as `"1m 30s"` and
 * `"2 minutes and 5 seconds"` into whole seconds. Zero and unparseable input throw.
 */
export function parseDurationSeconds(input: string): number {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    throw new Error("Duration must not be empty.");
  }

  // With an hours part the minutes stay below 60; "m:ss" alone may run to 999 minutes.
  const clockMatch = normalized.match(/^(?:(\d+):([0-5]?\d)|(\d{1,3})):([0-5]?\d)$/);
  if (clockMatch) {
    const hours = Number(clockMatch[1] ?? 0);
    const minutes = Number(clockMatch[2] ?? clockMatch[3]);
    const seconds = Number(clockMatch[4]);
    return requirePositive(hours * 3600 + minutes * 60 + seconds);
  }

  let total = 0;
  let matchedUnits = false;
  for (const match of normalized.matchAll(UNIT_PATTERN)) {
    matchedUnits = true;
    const unit = match[2].replace(/s$/, "");
    const multiplier = UNIT_SECONDS[unit] ?? UNIT_SECONDS[match[2]];
    total += Math.round(Number(match[1]) * multiplier);
  }

  if (matchedUnits) {
    const leftover = normalized
      .replace(UNIT_PATTERN, " ")
      .replace(/\band\b/g, " ")
      .replace(/,/g, " ")
      .trim();
    if (leftover) {
      throw new Error(`Could not parse duration "${input}".`);
    }
    return requirePositive(total);
  }

  const bareSeconds = Number(normalized);
  if (Number.isFinite(bareSeconds)) {
    return requirePositive(Math.round(bareSeconds));
  }

  throw new Error(`Could not parse duration "${input}".`);
}

function requirePositive(totalSeconds: number): number {
  if (totalSeconds <= 0) {
    throw new Error("Duration must be greater than zero seconds.");
  }
  return totalSeconds;
}
