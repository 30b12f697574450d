import type { FetchLike } from "../lib/http.js";
import type { IngestConfig } from "./config.js";
import type { Logger } from "./logger.js";

export interface PipelineContext {
  config: IngestConfig;
  logger: Logger;
  fetchImpl?: FetchLike;
  /** Backoff sleep between download attempts; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
}
