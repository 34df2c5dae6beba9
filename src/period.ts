const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

const PERIOD_PATTERN = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h|d))+$/;
const PART_PATTERN = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/g;

/**
 * Parses a period such as "7d", "24h", "90m" or "1h30m" into milliseconds.
 * Returns undefined when the text is not a period.
 */
export function parsePeriod(text: string): number | undefined {
  const trimmed = text.trim();
  if (!PERIOD_PATTERN.test(trimmed)) return undefined;

  let total = 0;
  for (const [, amount, unit] of trimmed.matchAll(PART_PATTERN)) {
    total += Number(amount) * UNIT_MS[unit];
  }
  return total;
}
