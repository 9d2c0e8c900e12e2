import { DEFAULT_MAX_BATCH_FAILURE_RATE } from "./thresholds";

/** A failure rate in [0, 1], or null when the value is missing or not one */
export function parseFailureRate(raw: string | undefined): number | null {
  if (raw == null || raw.trim() === "") return null;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) return null;
  return value;
}

export function isFailureRate(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value >= 0 && value <= 1;
}

function maxBatchFailureRate(): number {
  const raw = process.env.MAX_BATCH_FAILURE_RATE;
  const parsed = parseFailureRate(raw);
  if (parsed === null && raw) {
    console.warn(
      `[config] Ignoring MAX_BATCH_FAILURE_RATE=${raw}: expected a number between 0 and 1, ` +
      `using ${DEFAULT_MAX_BATCH_FAILURE_RATE}`
    );
  }
  return parsed ?? DEFAULT_MAX_BATCH_FAILURE_RATE;
}

export const config = {
  dbPath: process.env.CATALOG_DB_PATH || "data/guitar-catalog.db",
  createdBy: process.env.INGEST_CREATED_BY || "catalog-ingest",
  maxBatchFailureRate: maxBatchFailureRate(),
  verbose: process.env.INGEST_VERBOSE === "true",
};
