/**
 * Converts numeric-like driver values into a number.
 *
 * - number => itself
 * - string => parseFloat (NaN => 0); covers NUMERIC and BIGINT columns
 * - null/undefined => 0
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

/**
 * Parses a CSV cell. Blank or non-numeric cells become null rather than 0 so
 * that missing source data stays visible downstream.
 */
export function parseOptionalNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function roundTo(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}
