import { ResolveError } from "../pipeline/errors.js";

const SHEETS_ORIGIN = "https://docs.google.com/spreadsheets/d";

// https://docs.google.com/spreadsheets/d/<ID>/edit splits on "/" into
// ["https:", "", host, "spreadsheets", "d", "<ID>", "edit"].
const DOCUMENT_MARKER_SEGMENT = 4;
const DOCUMENT_ID_SEGMENT = 5;

export type SourceKind = "empty" | "direct" | "document" | "passthrough";

export interface SourceResolution {
  kind: SourceKind;
  endpoint: string;
  documentId?: string;
  gid?: string;
  /** Set when the input could not be turned into an export link. */
  warning?: ResolveError;
}

export function isDirectCsvLink(url: string): boolean {
  return url.includes("output=csv") || url.includes("format=csv");
}

/**
 * Turns a shared spreadsheet link into its CSV export endpoint. Published and
 * export links pass through; anything unrecognised comes back unchanged.
 */
export function toCsvEndpoint(input: string): string {
  return describeSource(input).endpoint;
}

export function describeSource(input: string): SourceResolution {
  const url = input.trim();
  if (!url) {
    return { kind: "empty", endpoint: "" };
  }

  if (isDirectCsvLink(url)) {
    return { kind: "direct", endpoint: url };
  }

  const parts = url.split("/");
  const documentId =
    parts[DOCUMENT_MARKER_SEGMENT] === "d"
      ? parts[DOCUMENT_ID_SEGMENT]?.split(/[?#]/)[0]
      : undefined;
  if (!documentId) {
    return {
      kind: "passthrough",
      endpoint: url,
      warning: new ResolveError(`No spreadsheet id found in ${url}`),
    };
  }

  const gid = readGid(url);
  if (!gid) {
    // No selector: the export defaults to the first sheet.
    return { kind: "document", endpoint: `${SHEETS_ORIGIN}/${documentId}/export?format=csv`, documentId };
  }

  return {
    kind: "document",
    endpoint: `${SHEETS_ORIGIN}/${documentId}/export?format=csv&gid=${encodeURIComponent(gid)}`,
    documentId,
    gid,
  };
}

function readGid(url: string): string | undefined {
  try {
    const parsed = new URL(url);
    // Links copied from the browser often carry the tab only in the fragment.
    const fromHash = new URLSearchParams(parsed.hash.replace(/^#/, "")).get("gid");
    return parsed.searchParams.get("gid") || fromHash || undefined;
  } catch {
    return undefined;
  }
}
