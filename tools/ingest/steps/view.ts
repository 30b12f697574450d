import { compareIsoDates, parseDayFirstDate } from "../lib/dates.js";
import {
  ALL_ENTITIES,
  type DashboardView,
  type DaySummary,
  type EnrichedTable,
  type NormalizedRecord,
  type ViewQuery,
} from "../pipeline/types.js";

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Distinct present dates, oldest first. */
export function listDates(records: readonly NormalizedRecord[]): string[] {
  const dates = new Set<string>();
  for (const record of records) {
    if (record.date !== null) {
      dates.add(record.date);
    }
  }
  return [...dates].sort(compareIsoDates);
}

export function listEntities(records: readonly NormalizedRecord[]): string[] {
  return [...new Set(records.map((record) => record.entity_name))].sort(compareText);
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

export function summarizeDay(daySubset: readonly NormalizedRecord[]): DaySummary {
  const liveDepths = daySubset
    .map((record) => record.live_depth_ft)
    .filter((depth): depth is number => depth !== null);

  return {
    reportingCount: new Set(daySubset.map((record) => record.entity_name)).size,
    overflowCount: daySubset.filter((record) => record.is_overflowing).length,
    medianLiveDepth: median(liveDepths),
    noLiveCount: daySubset.length - liveDepths.length,
  };
}

/** Day subset ordered by live depth, shallowest first; rows without a depth go last. */
export function rankByLiveDepth(daySubset: readonly NormalizedRecord[]): NormalizedRecord[] {
  return [...daySubset].sort((a, b) => {
    if (a.live_depth_ft === null || b.live_depth_ft === null) {
      return Number(a.live_depth_ft === null) - Number(b.live_depth_ft === null);
    }
    return a.live_depth_ft - b.live_depth_ft;
  });
}

function seriesFor(records: readonly NormalizedRecord[], entity: string): NormalizedRecord[] {
  // Array#sort is stable, so duplicate readings keep their sheet order.
  return records
    .filter((record) => record.entity_name === entity && record.date !== null)
    .sort((a, b) => compareIsoDates(a.date ?? "", b.date ?? ""));
}

/**
 * Builds the day subset, entity series and KPI summary for one date and
 * entity filter. An empty or undated table yields an empty view, never an
 * error.
 */
export function buildDashboardView(table: EnrichedTable, query: ViewQuery = {}): DashboardView {
  const dates = listDates(table.records);
  const entities = listEntities(table.records);
  const latest = dates.length > 0 ? dates[dates.length - 1] : null;

  // Accept the same day-first spellings the sheet uses, e.g. "05/01/24".
  const requested = query.date?.trim()
    ? (parseDayFirstDate(query.date) ?? query.date.trim())
    : undefined;
  const dateFallback = requested !== undefined && !dates.includes(requested);
  const selectedDate = requested !== undefined && !dateFallback ? requested : latest;

  const entityFilter = query.entity?.trim() ?? "";
  const selectedEntity =
    entityFilter === "" || entityFilter.toLowerCase() === ALL_ENTITIES ? ALL_ENTITIES : entityFilter;

  const daySubset =
    selectedDate === null ? [] : table.records.filter((record) => record.date === selectedDate);
  const entitySeries =
    selectedEntity === ALL_ENTITIES ? [...daySubset] : seriesFor(table.records, selectedEntity);

  return {
    selectedDate,
    dateFallback,
    selectedEntity,
    dates,
    entities,
    daySubset,
    entitySeries,
    dayRanking: rankByLiveDepth(daySubset),
    summary: summarizeDay(daySubset),
  };
}
