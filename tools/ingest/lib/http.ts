import { LoadError } from "../pipeline/errors.js";
import { emitEvent } from "../pipeline/events.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchTextOptions {
  timeoutMs: number;
  maxBytes: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

export interface FetchTextResult {
  ok: boolean;
  status?: number;
  statusText?: string;
  contentType?: string;
  bytesRead: number;
  body?: string;
  error?: string;
  retryable?: boolean;
  finalUrl?: string;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; reservoir-ingest/1.0)";

export async function fetchTextWithLimits(
  url: string,
  options: FetchTextOptions
): Promise<FetchTextResult> {
  const startedAt = Date.now();
  const fetchImpl = options.fetchImpl ?? fetch;
  emitEvent({
    level: "info",
    eventType: "http.request",
    message: "HTTP request start",
    phase: "start",
    action: "GET",
    url,
  });

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const forwardAbort = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await fetchImpl(url, {
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        Accept: "text/csv, text/plain;q=0.9, */*;q=0.1",
      },
      redirect: "follow",
      signal: controller.signal,
    });

    const contentType = response.headers.get("content-type") ?? undefined;

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new LoadError(
        `HTTP ${response.status} ${response.statusText} for ${url}`,
        undefined,
        retryable
      );
    }

    const buffer = await response.arrayBuffer();
    const bytesRead = buffer.byteLength;
    if (bytesRead > options.maxBytes) {
      throw new LoadError(
        `Response too large for ${url}: ${bytesRead} bytes > ${options.maxBytes} bytes`
      );
    }

    const body = decodeContent(new Uint8Array(buffer));

    emitEvent({
      level: "info",
      eventType: "http.response",
      message: "HTTP request success",
      phase: "end",
      durationMs: Date.now() - startedAt,
      statusCode: response.status,
      bytes: bytesRead,
    });

    return {
      ok: true,
      status: response.status,
      statusText: response.statusText,
      contentType,
      bytesRead,
      body,
      finalUrl: response.url || url,
    };
  } catch (error) {
    const failure = describeFailure(url, options.timeoutMs, error);
    emitEvent({
      level: "warn",
      eventType: "http.response",
      message: "HTTP request failed",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      errorMessage: failure.error,
      retryable: failure.retryable,
    });
    return { ok: false, bytesRead: 0, ...failure };
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

function describeFailure(
  url: string,
  timeoutMs: number,
  error: unknown
): { error: string; retryable: boolean } {
  if (error instanceof LoadError) {
    return { error: error.message, retryable: error.retryable };
  }

  if (error instanceof Error && error.name === "AbortError") {
    return { error: `Timed out after ${timeoutMs}ms: ${url}`, retryable: true };
  }

  // fetch rejects with a TypeError for DNS, TLS and connection failures.
  return { error: error instanceof Error ? error.message : String(error), retryable: true };
}

function decodeContent(buffer: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    return new TextDecoder("windows-1252").decode(buffer);
  }
}

export function looksLikeHtml(contentType: string | undefined, body: string): boolean {
  if (contentType?.includes("text/html")) {
    return true;
  }
  return /^\s*<(?:!doctype|html|head|body)\b/i.test(body);
}
