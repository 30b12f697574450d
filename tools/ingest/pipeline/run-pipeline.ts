import { loadRawTable } from "../steps/load.js";
import { normalizeSchema } from "../steps/normalize.js";
import { deriveRecords } from "../steps/derive.js";
import type { PipelineContext } from "./context.js";
import { PipelineError } from "./errors.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { EnrichedTable, StageName } from "./types.js";

async function runStage<T>(
  stage: StageName,
  context: PipelineContext,
  fn: () => Promise<T> | T
): Promise<T> {
  const startedAt = Date.now();
  return runWithTelemetryContext({ stage, attempt: 1 }, async () => {
    context.logger.debug("Stage started", { eventType: "stage.lifecycle", phase: "start" });
    try {
      const result = await fn();
      context.logger.debug("Stage finished", {
        eventType: "stage.lifecycle",
        phase: "end",
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      context.logger.error("Stage failed", {
        eventType: "stage.lifecycle",
        phase: "fail",
        durationMs: Date.now() - startedAt,
        errorCode: error instanceof PipelineError ? error.code : "UNEXPECTED",
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  });
}

/**
 * Fetches the sheet behind `endpoint` and turns it into the enriched table.
 * Load and schema failures propagate; cell-level problems only blank the
 * affected field.
 */
export async function runIngestPipeline(
  endpoint: string,
  context: PipelineContext
): Promise<EnrichedTable> {
  const startedAt = Date.now();
  context.logger.info("Ingest started", {
    eventType: "pipeline.lifecycle",
    phase: "start",
    url: endpoint,
  });

  const raw = await runStage("load", context, () =>
    loadRawTable(endpoint, {
      timeoutMs: context.config.httpTimeoutMs,
      maxBytes: context.config.maxDownloadBytes,
      maxAttempts: context.config.maxFetchAttempts,
      logger: context.logger,
      fetchImpl: context.fetchImpl,
      sleep: context.sleep,
      signal: context.signal,
    })
  );

  const canonical = await runStage("normalize", context, () =>
    normalizeSchema(raw, {
      placeholderName: context.config.placeholderName,
      logger: context.logger,
    })
  );

  const table = await runStage("derive", context, () => deriveRecords(canonical));

  const undated = table.records.filter((record) => record.date === null).length;
  context.logger.info("Ingest finished", {
    eventType: "pipeline.lifecycle",
    phase: "end",
    durationMs: Date.now() - startedAt,
    rows: table.records.length,
    undatedRows: undated,
  });
  return table;
}
