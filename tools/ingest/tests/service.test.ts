import { describe, expect, test, vi } from "vitest";
import type { FetchLike } from "../lib/http.js";
import { loadConfig } from "../pipeline/config.js";
import { LoadError, ResolveError } from "../pipeline/errors.js";
import { Logger } from "../pipeline/logger.js";
import { ReservoirDataService } from "../pipeline/service.js";
import { csvResponse, noSleep, readFixture } from "./helpers.js";

const SHEET_LINK = "https://docs.google.com/spreadsheets/d/sheet-1/edit#gid=7";
const EXPORT_URL = "https://docs.google.com/spreadsheets/d/sheet-1/export?format=csv&gid=7";
const STARTED_AT = Date.UTC(2024, 1, 1, 6, 0, 0);
const TTL_MS = 60_000;

function setup(sourceUrl = SHEET_LINK) {
  const clock = { now: STARTED_AT };
  const fixture = readFixture("daily-levels.csv");
  const fetchImpl = vi.fn<FetchLike>().mockImplementation(async () => csvResponse(fixture));
  const logger = new Logger();
  const service = new ReservoirDataService({
    config: loadConfig({}, { sourceUrl, cacheTtlMs: TTL_MS }),
    logger,
    fetchImpl,
    sleep: noSleep,
    now: () => clock.now,
  });
  return { clock, fetchImpl, logger, service };
}

describe("ReservoirDataService", () => {
  test("builds a dashboard snapshot from the sheet", async () => {
    const { fetchImpl, service } = setup();

    const snapshot = await service.getSnapshot();

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(EXPORT_URL);
    expect(snapshot.source).toEqual({
      kind: "document",
      endpoint: EXPORT_URL,
      documentId: "sheet-1",
      gid: "7",
    });
    expect(snapshot.fetchedAt).toBe("2024-02-01T06:00:00.000Z");

    const { table, view } = snapshot;
    expect(table.records).toHaveLength(6);
    expect(table.providedFields).toEqual([
      "serial_no",
      "entity_name",
      "top_ft",
      "hfl_ft",
      "dsl_ft",
      "npl_ft",
      "ppl_ft",
      "spill_diff",
      "live_storage",
      "status_text",
      "date",
    ]);
    expect(table.entityColumn).toEqual({ source: "mapped", label: "Name Of Dam" });
    expect(table.records[0]).toEqual({
      entity_name: "Alpha",
      date: "2024-02-01",
      serial_no: "1",
      top_ft: 120.5,
      hfl_ft: 118.2,
      dsl_ft: 90,
      npl_ft: 115,
      ppl_ft: 114,
      spill_diff: -1.5,
      live_storage: 1250.75,
      status_text: "3.25 Ft Live",
      live_depth_ft: 3.25,
      is_overflowing: true,
      spill_diff_reported: true,
      extra: { Remarks: "gates open" },
    });
    expect(table.records[5].date).toBeNull();
    expect(table.records[5].is_overflowing).toBe(true);

    expect(view.selectedDate).toBe("2024-02-01");
    expect(view.dates).toEqual(["2024-01-31", "2024-02-01"]);
    expect(view.entities).toEqual(["Alpha", "Bravo", "Charlie"]);
    expect(view.summary).toEqual({
      reportingCount: 3,
      overflowCount: 1,
      medianLiveDepth: 4.875,
      noLiveCount: 1,
    });
    expect(view.dayRanking.map((record) => record.entity_name)).toEqual(["Alpha", "Charlie", "Bravo"]);
  });

  test("serves the cached table until the TTL runs out", async () => {
    const { clock, fetchImpl, service } = setup();

    const first = await service.getTable();
    clock.now += TTL_MS - 1;
    const second = await service.getTable();
    expect(second).toBe(first);
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    clock.now += 1;
    const third = await service.getTable();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(third.fetchedAt).toBe(STARTED_AT + TTL_MS);
  });

  test("shares one download between concurrent callers", async () => {
    const { fetchImpl, service } = setup();

    const [a, b] = await Promise.all([service.getTable(), service.getSnapshot()]);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(b.table).toBe(a.value);
  });

  test("refresh reloads a fresh table", async () => {
    const { fetchImpl, service } = setup();

    await service.getTable();
    await service.refresh();

    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  test("keeps the last good table when a reload fails", async () => {
    const { clock, fetchImpl, service } = setup();
    const good = await service.getTable();

    fetchImpl.mockResolvedValueOnce(new Response("", { status: 404, statusText: "Not Found" }));
    clock.now += 5_000;

    await expect(service.refresh()).rejects.toBeInstanceOf(LoadError);
    expect(service.lastKnown()).toBe(good);
    expect(await service.getTable()).toBe(good);
  });

  test("rejects a missing source before fetching", async () => {
    const { fetchImpl, service } = setup("");

    await expect(service.getSnapshot()).rejects.toBeInstanceOf(ResolveError);
    await expect(service.getSnapshot()).rejects.toThrow(
      "No sheet URL configured; set SHEET_PUBLISHED_CSV or pass a Google Sheets link"
    );
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(service.lastKnown()).toBeUndefined();
  });

  test("uses an unrecognised link as-is and warns", async () => {
    const { fetchImpl, logger, service } = setup("https://example.com/levels.csv");
    const warn = vi.spyOn(logger, "warn");

    const snapshot = await service.getSnapshot();

    expect(fetchImpl.mock.calls[0][0]).toBe("https://example.com/levels.csv");
    expect(snapshot.source.kind).toBe("passthrough");
    expect(warn).toHaveBeenCalledWith(
      "Source is not a recognised sheet link; using it as-is",
      expect.objectContaining({ eventType: "source.resolve", errorCode: "RESOLVE_ERROR" })
    );
  });

  test("builds identical snapshots from identical sheets", async () => {
    const first = await setup().service.getSnapshot({ entity: "Alpha" });
    const second = await setup().service.getSnapshot({ entity: "Alpha" });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(first.view.entitySeries.map((record) => record.date)).toEqual(["2024-01-31", "2024-02-01"]);
  });
});
