import { parseDayFirstDate } from "../lib/dates.js";
import { DEFAULT_PLACEHOLDER_NAME } from "../pipeline/config.js";
import {
  CANONICAL_FIELDS,
  type CanonicalTable,
  type EnrichedTable,
  type NormalizedRecord,
  type NumericField,
  type RawCell,
  type RawRow,
} from "../pipeline/types.js";

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const THOUSANDS_PATTERN = /^[+-]?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;

// First number directly followed by the unit, e.g. "9.80 Ft Live".
const LIVE_DEPTH_PATTERN = /(-?\d+(?:\.\d+)?)\s*Ft/;

const CANONICAL_NAMES = new Set<string>(CANONICAL_FIELDS);

export function parseNumericCell(value: RawCell | undefined): number | null {
  if (value == null) {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const cleaned = THOUSANDS_PATTERN.test(trimmed) ? trimmed.replace(/,/g, "") : trimmed;
  if (!NUMERIC_PATTERN.test(cleaned)) {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function extractLiveDepth(status: string | null | undefined): number | null {
  if (status == null) {
    return null;
  }
  const match = LIVE_DEPTH_PATTERN.exec(status);
  return match ? Number(match[1]) : null;
}

export function isOverflowing(spillDiff: number | null): boolean {
  return spillDiff !== null && spillDiff < 0;
}

function textCell(value: RawCell | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function deriveRecord(row: RawRow): NormalizedRecord {
  const num = (field: NumericField) => parseNumericCell(row[field]);
  const spillDiff = num("spill_diff");
  const statusText = textCell(row.status_text);
  const extra: Record<string, RawCell> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!CANONICAL_NAMES.has(key)) {
      extra[key] = value;
    }
  }

  return {
    entity_name: textCell(row.entity_name) ?? DEFAULT_PLACEHOLDER_NAME,
    date: parseDayFirstDate(row.date),
    serial_no: textCell(row.serial_no),
    top_ft: num("top_ft"),
    hfl_ft: num("hfl_ft"),
    dsl_ft: num("dsl_ft"),
    npl_ft: num("npl_ft"),
    ppl_ft: num("ppl_ft"),
    spill_diff: spillDiff,
    live_storage: num("live_storage"),
    status_text: statusText,
    live_depth_ft: extractLiveDepth(statusText),
    is_overflowing: isOverflowing(spillDiff),
    spill_diff_reported: spillDiff !== null,
    extra,
  };
}

/** Adds typed dates, live depth and the overflow flag to every row. Never throws. */
export function deriveRecords(table: CanonicalTable): EnrichedTable {
  return {
    records: table.rows.map(deriveRecord),
    providedFields: [...table.providedFields],
    entityColumn: { ...table.entityColumn },
  };
}
