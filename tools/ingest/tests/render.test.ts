import { describe, expect, test } from "vitest";
import { formatDepth, renderPrettySnapshot } from "../cli/render.js";
import type { DashboardSnapshot } from "../pipeline/service.js";
import type { NormalizedRecord, ViewQuery } from "../pipeline/types.js";
import { buildDashboardView } from "../steps/view.js";
import { sampleRecord, tableOf } from "./helpers.js";

const records = [
  sampleRecord({ entity_name: "Bravo", spill_diff: 2, status_text: "Dead" }),
  sampleRecord({
    entity_name: "Alpha",
    live_depth_ft: 3.25,
    spill_diff: -1.5,
    is_overflowing: true,
    status_text: "3.25 Ft Live",
  }),
  sampleRecord({
    entity_name: "Alpha",
    date: "2024-01-31",
    live_depth_ft: 2.75,
    spill_diff: 0.5,
    status_text: "2.75 Ft Live",
  }),
];

function snapshotOf(rows: NormalizedRecord[], query: ViewQuery = {}): DashboardSnapshot {
  const table = tableOf(rows);
  return {
    source: { kind: "direct", endpoint: "https://example.com/levels?output=csv" },
    fetchedAt: "2024-02-01T06:00:00.000Z",
    table,
    view: buildDashboardView(table, query),
  };
}

describe("formatDepth", () => {
  test("shows two decimals or a dash", () => {
    expect(formatDepth(9.8)).toBe("9.80");
    expect(formatDepth(null)).toBe("—");
  });
});

describe("renderPrettySnapshot", () => {
  test("lists every dam for the day, sorted by name", () => {
    expect(renderPrettySnapshot(snapshotOf(records)).split("\n")).toEqual([
      "Reservoir levels — 2024-02-01",
      "Dams reported: 2 | Spilling: 1 | Median live depth (ft): 3.25 | Dead / no live: 1",
      "",
      "Alpha                         3.25      -1.5  SPILLING  3.25 Ft Live",
      "Bravo                            —         2    Dead",
      "",
      "Last refreshed: 2024-02-01T06:00:00.000Z",
    ]);
  });

  test("shows the trend for one dam and notes a date fallback", () => {
    const lines = renderPrettySnapshot(snapshotOf(records, { date: "2023-01-01", entity: "Alpha" })).split("\n");

    expect(lines.slice(0, 2)).toEqual([
      "Requested date not in sheet; showing latest (2024-02-01).",
      "Reservoir levels — 2024-02-01",
    ]);
    expect(lines.slice(4, 7)).toEqual([
      "Trend — Alpha",
      "2024-01-31  Alpha                         2.75       0.5    2.75 Ft Live",
      "2024-02-01  Alpha                         3.25      -1.5  SPILLING  3.25 Ft Live",
    ]);
  });

  test("says so when the selected dam has no readings", () => {
    const lines = renderPrettySnapshot(snapshotOf(records, { entity: "Zulu" })).split("\n");
    expect(lines.slice(3, 5)).toEqual(["Trend — Zulu", "No data for selection."]);
  });

  test("reports a sheet without dated readings", () => {
    expect(renderPrettySnapshot(snapshotOf([sampleRecord({ date: null })]))).toBe(
      "No dated readings in the sheet."
    );
  });
});
