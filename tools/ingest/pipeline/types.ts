export type StageName = "resolve" | "load" | "normalize" | "derive";

export type LogFormat = "pretty" | "json";

export type EventType =
  | "pipeline.lifecycle"
  | "stage.lifecycle"
  | "source.resolve"
  | "http.request"
  | "http.response"
  | "cache.hit"
  | "cache.miss"
  | "cache.store"
  | "schema.fallback"
  | "retry"
  | "file.read"
  | "file.write";

export interface PipelineEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  stage: StageName | "system";
  attempt: number;
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  url?: string;
  retryable?: boolean;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  terminal: boolean;
  eventFilePath?: string;
}

/** A cell as fetched: text, or `null` when the cell was empty. */
export type RawCell = string | null;

export type RawRow = Record<string, RawCell>;

export interface RawTable {
  /** Trimmed column labels, in source order. */
  headers: string[];
  rows: RawRow[];
}

export const CANONICAL_FIELDS = [
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
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type NumericField =
  | "top_ft"
  | "hfl_ft"
  | "dsl_ft"
  | "npl_ft"
  | "ppl_ft"
  | "spill_diff"
  | "live_storage";

export type EntityColumnSource = "mapped" | "fallback" | "placeholder";

export interface CanonicalTable {
  /** Column names after renaming; always contains `entity_name` and `date`. */
  columns: string[];
  rows: RawRow[];
  /** Canonical fields that came from a source column. */
  providedFields: CanonicalField[];
  entityColumn: {
    source: EntityColumnSource;
    /** Source label the entity names were read from, when there was one. */
    label?: string;
  };
}

/** One reading for one dam on one date. */
export interface NormalizedRecord {
  entity_name: string;
  /** ISO calendar date (`YYYY-MM-DD`), `null` when the cell did not parse. */
  date: string | null;
  serial_no: string | null;
  top_ft: number | null;
  hfl_ft: number | null;
  dsl_ft: number | null;
  npl_ft: number | null;
  ppl_ft: number | null;
  spill_diff: number | null;
  live_storage: number | null;
  status_text: string | null;
  live_depth_ft: number | null;
  is_overflowing: boolean;
  /** `false` when `is_overflowing` is only false because no differential was reported. */
  spill_diff_reported: boolean;
  /** Columns with no canonical mapping, passed through untouched. */
  extra: Record<string, RawCell>;
}

export interface EnrichedTable {
  records: NormalizedRecord[];
  providedFields: CanonicalField[];
  entityColumn: CanonicalTable["entityColumn"];
}

export const ALL_ENTITIES = "all";

export interface ViewQuery {
  date?: string;
  /** An entity name, or `"all"`. */
  entity?: string;
}

export interface DaySummary {
  reportingCount: number;
  overflowCount: number;
  /** `null` means no live depth was reported for the day. */
  medianLiveDepth: number | null;
  noLiveCount: number;
}

export interface DashboardView {
  selectedDate: string | null;
  /** True when the requested date was not in the table and the latest one was used. */
  dateFallback: boolean;
  selectedEntity: string;
  dates: string[];
  entities: string[];
  daySubset: NormalizedRecord[];
  entitySeries: NormalizedRecord[];
  dayRanking: NormalizedRecord[];
  summary: DaySummary;
}
