import { format, isValid, parse } from "date-fns";

/**
 * Accepted day-first shapes, tried in order. "05/01/24" is always the 5th of
 * January 2024.
 */
const DAY_FIRST_FORMATS = [
  // "yyyy" also accepts one or two digits, so each two-digit form goes first.
  "d/M/yy",
  "d/M/yyyy",
  "d-M-yy",
  "d-M-yyyy",
  "d.M.yy",
  "d.M.yyyy",
  "d-MMM-yy",
  "d-MMM-yyyy",
  "d MMM yy",
  "d MMM yyyy",
  "d MMMM yyyy",
  "yyyy-M-d",
] as const;

// Only reached when no day-first shape fits, e.g. "12/25/24".
const FALLBACK_FORMATS = [
  "M/d/yy",
  "M/d/yyyy",
  "yyyy/M/d",
  "MMM d, yyyy",
  "MMMM d, yyyy",
] as const;

// Two-digit years resolve to the century window around this date (1950–2049).
const REFERENCE_DATE = new Date(2000, 0, 1);

// "yyyy" would otherwise read "24" as the year 24.
const MIN_YEAR = 1900;

const TIME_SUFFIX = /[ T]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[AaPp][Mm])?(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses a spreadsheet date cell into an ISO calendar date (`YYYY-MM-DD`).
 * Returns `null` for empty, malformed, or impossible dates.
 */
export function parseDayFirstDate(text: string | null | undefined): string | null {
  if (text == null) {
    return null;
  }

  const value = text.trim().replace(TIME_SUFFIX, "").trim();
  if (!value) {
    return null;
  }

  for (const pattern of [...DAY_FIRST_FORMATS, ...FALLBACK_FORMATS]) {
    const parsed = parse(value, pattern, REFERENCE_DATE);
    if (isValid(parsed) && parsed.getFullYear() >= MIN_YEAR) {
      return format(parsed, "yyyy-MM-dd");
    }
  }
  return null;
}

export function compareIsoDates(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
