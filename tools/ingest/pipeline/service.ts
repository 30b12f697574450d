import { TtlCache, type CacheEntry } from "../lib/cache.js";
import { describeSource, type SourceResolution } from "../lib/source.js";
import { buildDashboardView } from "../steps/view.js";
import type { PipelineContext } from "./context.js";
import { ResolveError } from "./errors.js";
import { runIngestPipeline } from "./run-pipeline.js";
import type { DashboardView, EnrichedTable, ViewQuery } from "./types.js";

export interface DashboardSnapshot {
  source: {
    kind: SourceResolution["kind"];
    endpoint: string;
    documentId?: string;
    gid?: string;
  };
  fetchedAt: string;
  table: EnrichedTable;
  view: DashboardView;
}

export interface ReservoirDataServiceOptions extends PipelineContext {
  cache?: TtlCache<EnrichedTable>;
  now?: () => number;
}

/**
 * Entry point for the presentation layer: resolves the configured sheet,
 * serves the enriched table from the TTL cache, and builds views on top.
 */
export class ReservoirDataService {
  readonly cache: TtlCache<EnrichedTable>;
  private readonly context: PipelineContext;

  constructor(options: ReservoirDataServiceOptions) {
    const { cache, now, ...context } = options;
    this.context = context;
    this.cache = cache ?? new TtlCache<EnrichedTable>(context.config.cacheTtlMs, now);
  }

  resolve(source: string = this.context.config.sourceUrl): SourceResolution {
    const resolution = describeSource(source);
    if (resolution.warning) {
      this.context.logger.warn("Source is not a recognised sheet link; using it as-is", {
        stage: "resolve",
        eventType: "source.resolve",
        url: resolution.endpoint,
        errorCode: resolution.warning.code,
      });
    } else {
      this.context.logger.debug("Source resolved", {
        stage: "resolve",
        eventType: "source.resolve",
        kind: resolution.kind,
        url: resolution.endpoint,
      });
    }
    return resolution;
  }

  async getTable(source?: string): Promise<CacheEntry<EnrichedTable>> {
    const endpoint = this.requireEndpoint(this.resolve(source));
    return this.cache.getOrLoad(endpoint, () => runIngestPipeline(endpoint, this.context));
  }

  /** Reloads even when the cached table is still fresh. */
  async refresh(source?: string): Promise<CacheEntry<EnrichedTable>> {
    const endpoint = this.requireEndpoint(this.resolve(source));
    return this.cache.load(endpoint, () => runIngestPipeline(endpoint, this.context));
  }

  /** The last table that loaded successfully, however old. */
  lastKnown(source?: string): CacheEntry<EnrichedTable> | undefined {
    const { endpoint } = describeSource(source ?? this.context.config.sourceUrl);
    return endpoint ? this.cache.peek(endpoint) : undefined;
  }

  async getSnapshot(query: ViewQuery = {}, source?: string): Promise<DashboardSnapshot> {
    const resolution = this.resolve(source);
    const endpoint = this.requireEndpoint(resolution);
    const entry = await this.cache.getOrLoad(endpoint, () =>
      runIngestPipeline(endpoint, this.context)
    );

    return {
      source: {
        kind: resolution.kind,
        endpoint,
        documentId: resolution.documentId,
        gid: resolution.gid,
      },
      fetchedAt: new Date(entry.fetchedAt).toISOString(),
      table: entry.value,
      view: buildDashboardView(entry.value, query),
    };
  }

  private requireEndpoint(resolution: SourceResolution): string {
    if (!resolution.endpoint) {
      throw new ResolveError(
        "No sheet URL configured; set SHEET_PUBLISHED_CSV or pass a Google Sheets link"
      );
    }
    return resolution.endpoint;
  }
}
