// Path: src/utils/duration.ts
// Duration parsing for configuration values

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parse a duration into milliseconds.
 *
 * Accepts a number of milliseconds, a numeric string, or unit-suffixed parts such as
 * "14m", "90s", "1h30m" or "500ms".
 *
 * @returns Milliseconds, or undefined when the value is not a valid duration
 */
export function parseDuration(value: string | number): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }

  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(DURATION_PART)) {
    if (match.index !== consumed) return undefined;
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
    consumed += match[0].length;
  }

  return consumed === trimmed.length && consumed > 0 ? Math.round(total) : undefined;
}

/**
 * Format milliseconds as a short human-readable duration (e.g. "14m", "1h30m", "45s").
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;

  const hours = Math.floor(ms / UNIT_MS.h);
  const minutes = Math.floor((ms % UNIT_MS.h) / UNIT_MS.m);
  const seconds = Math.floor((ms % UNIT_MS.m) / UNIT_MS.s);

  let result = '';
  if (hours > 0) result += `${hours}h`;
  if (minutes > 0) result += `${minutes}m`;
  if (seconds > 0) result += `${seconds}s`;
  return result;
}
