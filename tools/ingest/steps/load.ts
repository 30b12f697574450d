import { parseCsv, toRawTable } from "../lib/csv.js";
import { fetchTextWithLimits, looksLikeHtml, type FetchLike } from "../lib/http.js";
import { LoadError } from "../pipeline/errors.js";
import type { Logger } from "../pipeline/logger.js";
import { withRetry } from "../pipeline/retry.js";
import type { RawTable } from "../pipeline/types.js";

export interface LoadOptions {
  timeoutMs: number;
  maxBytes: number;
  maxAttempts: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

export async function loadRawTable(endpoint: string, options: LoadOptions): Promise<RawTable> {
  if (!endpoint.trim()) {
    throw new LoadError("No data source configured");
  }

  const body = await withRetry(
    async () => {
      const result = await fetchTextWithLimits(endpoint, {
        timeoutMs: options.timeoutMs,
        maxBytes: options.maxBytes,
        signal: options.signal,
        fetchImpl: options.fetchImpl,
      });
      if (!result.ok || result.body === undefined) {
        throw new LoadError(result.error ?? `Could not load ${endpoint}`, undefined, result.retryable);
      }
      if (looksLikeHtml(result.contentType, result.body)) {
        // Sign-in pages and unshared documents come back as HTML with status 200.
        throw new LoadError(
          `Expected CSV from ${endpoint} but received HTML; check that the sheet is shared or published`
        );
      }
      return result.body;
    },
    {
      maxAttempts: options.maxAttempts,
      sleep: options.sleep,
      onRetry: ({ attempt, backoffMs, error }) => {
        options.logger.warn("Retrying sheet download", {
          eventType: "retry",
          attempt,
          backoffMs,
          errorCode: error.code,
          errorMessage: error.message,
        });
      },
    }
  );

  const table = toRawTable(parseCsv(body));
  if (table.headers.length === 0 || table.rows.length === 0) {
    throw new LoadError(`Sheet at ${endpoint} has no data rows`);
  }

  options.logger.info("Sheet loaded", {
    eventType: "stage.lifecycle",
    phase: "progress",
    rows: table.rows.length,
    columns: table.headers.length,
  });
  return table;
}
