import AjvModule, { type SchemaObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { readJsonFile } from "./json.js";
import { SNAPSHOT_SCHEMA_PATH } from "./paths.js";

// Both packages are CommonJS; under NodeNext their classes sit on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export interface ValidationIssue {
  file: string;
  messages: string[];
}

function createAjv(): InstanceType<typeof Ajv> {
  const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
  addFormats(ajv);
  return ajv;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

let compiledSnapshotValidator: ValidateFunction | null = null;

function snapshotValidator(): ValidateFunction {
  if (!compiledSnapshotValidator) {
    const schema = readJsonFile(SNAPSHOT_SCHEMA_PATH);
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema at ${SNAPSHOT_SCHEMA_PATH} is not a JSON object`);
    }
    compiledSnapshotValidator = createAjv().compile(schema);
  }
  return compiledSnapshotValidator;
}

/**
 * Checks a snapshot against `schema/snapshot.schema.json` before it is written
 * to disk. Returns no issues when the snapshot is valid.
 */
export function validateSnapshot(snapshot: unknown, file = "snapshot.json"): ValidationIssue[] {
  const validate = snapshotValidator();
  // Validate the serialised form so undefined-valued keys match what is written.
  const data: unknown = JSON.parse(JSON.stringify(snapshot));
  if (validate(data)) {
    return [];
  }
  return [
    {
      file,
      messages: (validate.errors ?? []).map(
        (err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`
      ),
    },
  ];
}
