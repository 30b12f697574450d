import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_DOWNLOAD_BYTES = 5 * 1024 * 1024;
export const DEFAULT_MAX_FETCH_ATTEMPTS = 2;
export const DEFAULT_PLACEHOLDER_NAME = "Unknown";

const booleanFlag = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0", ""])])
  .transform((value) => value === true || value === "true" || value === "1");

export const ingestConfigSchema = z.object({
  sourceUrl: z.string().trim().default(""),
  cacheTtlMs: z.coerce.number().int().positive().default(DEFAULT_CACHE_TTL_MS),
  httpTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
  maxDownloadBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_DOWNLOAD_BYTES),
  maxFetchAttempts: z.coerce.number().int().min(1).max(5).default(DEFAULT_MAX_FETCH_ATTEMPTS),
  placeholderName: z.string().trim().min(1).default(DEFAULT_PLACEHOLDER_NAME),
  logFormat: z.enum(["pretty", "json"]).default("pretty"),
  verbose: booleanFlag.default(false),
  eventFile: z.string().min(1).optional(),
});

export type IngestConfig = z.infer<typeof ingestConfigSchema>;
export type IngestConfigInput = z.input<typeof ingestConfigSchema>;

const ENV_KEYS: Record<keyof IngestConfig, string> = {
  sourceUrl: "SHEET_PUBLISHED_CSV",
  cacheTtlMs: "DAM_CACHE_TTL_MS",
  httpTimeoutMs: "DAM_HTTP_TIMEOUT_MS",
  maxDownloadBytes: "DAM_MAX_DOWNLOAD_BYTES",
  maxFetchAttempts: "DAM_MAX_FETCH_ATTEMPTS",
  placeholderName: "DAM_PLACEHOLDER_NAME",
  logFormat: "DAM_LOG_FORMAT",
  verbose: "DAM_VERBOSE",
  eventFile: "DAM_EVENT_FILE",
};

/**
 * Builds the runtime configuration from environment variables, with explicit
 * overrides (CLI flags) taking precedence. Unset and empty variables fall back
 * to the defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<IngestConfigInput> = {}
): IngestConfig {
  const fromEnv: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") {
      fromEnv[key] = value;
    }
  }

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const parsed = ingestConfigSchema.safeParse({ ...fromEnv, ...definedOverrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, parsed.error);
  }
  return parsed.data;
}
