import type { DashboardSnapshot } from "../pipeline/service.js";
import { ALL_ENTITIES, type NormalizedRecord } from "../pipeline/types.js";

function sortByName(records: readonly NormalizedRecord[]): NormalizedRecord[] {
  return [...records].sort((a, b) => {
    if (a.entity_name === b.entity_name) return 0;
    return a.entity_name < b.entity_name ? -1 : 1;
  });
}

export function formatDepth(value: number | null): string {
  return value === null ? "—" : value.toFixed(2);
}

function renderRow(record: NormalizedRecord): string {
  const cells = [
    record.entity_name.padEnd(24),
    formatDepth(record.live_depth_ft).padStart(8),
    (record.spill_diff === null ? "—" : String(record.spill_diff)).padStart(8),
    record.is_overflowing ? "SPILLING" : "",
    record.status_text ?? "",
  ];
  return cells.join("  ").trimEnd();
}

export function renderPrettySnapshot(snapshot: DashboardSnapshot): string {
  const { view } = snapshot;
  const lines: string[] = [];

  if (view.selectedDate === null) {
    lines.push("No dated readings in the sheet.");
    return lines.join("\n");
  }

  if (view.dateFallback) {
    lines.push(`Requested date not in sheet; showing latest (${view.selectedDate}).`);
  }

  lines.push(`Reservoir levels — ${view.selectedDate}`);
  lines.push(
    [
      `Dams reported: ${view.summary.reportingCount}`,
      `Spilling: ${view.summary.overflowCount}`,
      `Median live depth (ft): ${formatDepth(view.summary.medianLiveDepth)}`,
      `Dead / no live: ${view.summary.noLiveCount}`,
    ].join(" | ")
  );
  lines.push("");

  const overview = view.selectedEntity === ALL_ENTITIES;
  const rows = overview ? sortByName(view.daySubset) : view.entitySeries;
  if (!overview) {
    lines.push(`Trend — ${view.selectedEntity}`);
  }
  for (const record of rows) {
    const prefix = overview ? "" : `${record.date ?? "—"}  `;
    lines.push(`${prefix}${renderRow(record)}`);
  }
  if (rows.length === 0) {
    lines.push("No data for selection.");
  }

  lines.push("");
  lines.push(`Last refreshed: ${snapshot.fetchedAt}`);
  return lines.join("\n");
}
