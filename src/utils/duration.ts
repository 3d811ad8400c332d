const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parses "1.5s", "500ms", "2m" or a bare number (seconds) into milliseconds.
 * Zero is accepted so a retry delay can be disabled.
 */
export function parseDuration(input: string, label = "duration"): number {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new Error(`${label} must be a non-empty string`);
  }

  const match = /^([0-9]+(?:\.[0-9]+)?)([a-zA-Z]+)?$/.exec(trimmed);
  if (!match) {
    throw new Error(`Invalid ${label} format: "${input}"`);
  }

  const value = Number(match[1]);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${label} must be a non-negative number`);
  }

  const unit = (match[2] ?? "s").toLowerCase();
  const multiplier = UNIT_TO_MS[unit];

  if (!multiplier) {
    const allowed = Object.keys(UNIT_TO_MS).join(", ");
    throw new Error(`Invalid ${label} unit "${match[2]}". Allowed: ${allowed}.`);
  }

  return Math.round(value * multiplier);
}

export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return "unknown";
  }

  const units: Array<[string, number]> = [
    ["h", UNIT_TO_MS.h],
    ["m", UNIT_TO_MS.m],
    ["s", UNIT_TO_MS.s],
  ];

  for (const [unit, value] of units) {
    if (ms >= value) {
      const amount = ms / value;
      return `${Number.isInteger(amount) ? amount : amount.toFixed(1)}${unit}`;
    }
  }

  return `${Math.round(ms)}ms`;
}
