import { readFileSync } from "fs";
import { join } from "path";
import { FIXTURES_DIR } from "../lib/paths.js";
import type { EnrichedTable, NormalizedRecord } from "../pipeline/types.js";

export function readFixture(name: string): string {
  return readFileSync(join(FIXTURES_DIR, name), "utf-8");
}

export function csvResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, {
    status: 200,
    headers: { "content-type": "text/csv; charset=utf-8" },
    ...init,
  });
}

export async function noSleep(): Promise<void> {}

export function sampleRecord(overrides: Partial<NormalizedRecord> = {}): NormalizedRecord {
  return {
    entity_name: "Alpha",
    date: "2024-02-01",
    serial_no: null,
    top_ft: null,
    hfl_ft: null,
    dsl_ft: null,
    npl_ft: null,
    ppl_ft: null,
    spill_diff: null,
    live_storage: null,
    status_text: null,
    live_depth_ft: null,
    is_overflowing: false,
    spill_diff_reported: false,
    extra: {},
    ...overrides,
  };
}

export function tableOf(records: NormalizedRecord[]): EnrichedTable {
  return {
    records,
    providedFields: ["entity_name", "date"],
    entityColumn: { source: "mapped", label: "Name Of Dam" },
  };
}
