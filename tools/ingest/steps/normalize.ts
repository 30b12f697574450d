import { SchemaError } from "../pipeline/errors.js";
import type { Logger } from "../pipeline/logger.js";
import type {
  CanonicalField,
  CanonicalTable,
  RawRow,
  RawTable,
} from "../pipeline/types.js";
import { DEFAULT_PLACEHOLDER_NAME } from "../pipeline/config.js";

/** Sheet header → canonical field. Labels are matched after trimming. */
export const COLUMN_MAP: ReadonlyMap<string, CanonicalField> = new Map<string, CanonicalField>([
  ["SR. No", "serial_no"],
  ["Name Of Dam", "entity_name"],
  ["Top of Dam FT", "top_ft"],
  ["H.F.L Ft", "hfl_ft"],
  ["D.S.L Ft", "dsl_ft"],
  ["N.P.L Ft", "npl_ft"],
  ["P.P.L Ft", "ppl_ft"],
  ["Spill_Diff", "spill_diff"],
  ["Total Live Storage", "live_storage"],
  ["Status", "status_text"],
  ["Date", "date"],
]);

const ENTITY_TOKENS = ["dam", "reservoir"];

export interface NormalizeOptions {
  placeholderName?: string;
  logger?: Logger;
}

export function normalizeSchema(raw: RawTable, options: NormalizeOptions = {}): CanonicalTable {
  const placeholder = options.placeholderName ?? DEFAULT_PLACEHOLDER_NAME;

  const renames = new Map<string, string>();
  const provided = new Set<CanonicalField>();
  for (const header of raw.headers) {
    const target = COLUMN_MAP.get(header);
    if (target && !provided.has(target)) {
      renames.set(header, target);
      provided.add(target);
    }
  }

  if (!provided.has("date")) {
    throw new SchemaError(
      `No "Date" column found; sheet headers are: ${raw.headers.join(", ") || "(none)"}`
    );
  }

  let entityColumn: CanonicalTable["entityColumn"];
  const mappedEntity = [...renames].find(([, target]) => target === "entity_name");
  if (mappedEntity) {
    entityColumn = { source: "mapped", label: mappedEntity[0] };
  } else {
    const candidate = findEntityColumn(raw.headers.filter((header) => !renames.has(header)));
    if (candidate) {
      renames.set(candidate, "entity_name");
      provided.add("entity_name");
      entityColumn = { source: "fallback", label: candidate };
      options.logger?.warn("Using fallback column for dam names", {
        eventType: "schema.fallback",
        column: candidate,
      });
    } else {
      entityColumn = { source: "placeholder" };
      options.logger?.warn("No dam name column; every row gets the placeholder name", {
        eventType: "schema.fallback",
        placeholder,
      });
    }
  }

  const columns = raw.headers.map((header) => renames.get(header) ?? header);
  // A passthrough column may already be called e.g. "date"; the renamed one wins.
  const renamedTargets = new Set(renames.values());
  const rows = raw.rows.map((row) => {
    const out: RawRow = {};
    for (const header of raw.headers) {
      const target = renames.get(header);
      if (target) {
        out[target] = row[header] ?? null;
      } else if (!renamedTargets.has(header)) {
        out[header] = row[header] ?? null;
      }
    }
    const name = out.entity_name?.trim();
    out.entity_name = name ? name : placeholder;
    return out;
  });

  if (!columns.includes("entity_name")) {
    columns.push("entity_name");
  }

  return {
    columns: [...new Set(columns)],
    rows,
    providedFields: [...provided],
    entityColumn,
  };
}

function findEntityColumn(headers: string[]): string | undefined {
  return headers.find((header) => {
    const lower = header.toLowerCase();
    return lower.includes("name") && ENTITY_TOKENS.some((token) => lower.includes(token));
  });
}
