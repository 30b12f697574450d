import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

export const INGEST_ROOT = resolve(THIS_DIR, "..");
export const SCHEMA_DIR = join(INGEST_ROOT, "schema");
export const FIXTURES_DIR = join(INGEST_ROOT, "tests", "fixtures");

export const SNAPSHOT_SCHEMA_PATH = join(SCHEMA_DIR, "snapshot.schema.json");
