import type { RawCell, RawRow, RawTable } from "../pipeline/types.js";

export interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

/**
 * Splits CSV text into a header row and body rows. Blank lines are dropped;
 * cell text is kept as-is apart from the byte-order mark and stray carriage
 * returns.
 */
export function parseCsv(content: string): ParsedCsv {
  const rows = parseCsvRows(content.replace(/^\uFEFF/, ""))
    .map((row) => row.map((cell) => cell.replace(/\r/g, "")))
    .filter((row) => row.some((cell) => cell.trim().length > 0));

  if (rows.length === 0) {
    return { headers: [], rows: [] };
  }

  return {
    headers: rows[0],
    rows: rows.slice(1),
  };
}

export function buildHeaders(rawHeaders: string[]): string[] {
  return rawHeaders.map((header, index) => {
    const trimmed = header.trim();
    return trimmed ? trimmed : `Column ${index + 1}`;
  });
}

function toRawCell(value: string | undefined): RawCell {
  if (value === undefined || value.trim().length === 0) {
    return null;
  }
  return value;
}

/** Keys each body row by its trimmed header label. */
export function toRawTable(parsed: ParsedCsv): RawTable {
  const headers = buildHeaders(parsed.headers);
  const rows = parsed.rows.map((row) => {
    const record: RawRow = {};
    headers.forEach((header, index) => {
      // Duplicate labels keep the first column.
      if (!Object.hasOwn(record, header)) {
        record[header] = toRawCell(row[index]);
      }
    });
    return record;
  });

  return { headers: [...new Set(headers)], rows };
}

function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        currentCell += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      continue;
    }

    currentCell += char;
  }

  if (currentCell.length > 0 || currentRow.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}
