import { ArchivedRecord, FetchAttempt, LedgerEntry, RunRecord } from "../types";

const OUTCOMES: readonly unknown[] = ["success", "failure", "skipped", "rejected", "cancelled"];
const KINDS: readonly unknown[] = ["pdf", "tiff", "jpeg", "png"];

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isOptionalCount(value: unknown): boolean {
  return value === undefined || isCount(value);
}

export function isFetchAttempt(value: unknown): value is FetchAttempt {
  if (!isObject(value)) {
    return false;
  }
  return (
    value.type === "attempt" &&
    isString(value.runId) &&
    isString(value.identifier) &&
    isOptionalCount(value.position) &&
    typeof value.url === "string" &&
    typeof value.host === "string" &&
    isString(value.timestamp) &&
    OUTCOMES.includes(value.outcome) &&
    isCount(value.elapsedMs) &&
    isCount(value.retries)
  );
}

export function isArchivedRecord(value: unknown): value is ArchivedRecord {
  if (!isObject(value)) {
    return false;
  }
  return (
    value.type === "archived" &&
    isString(value.runId) &&
    isString(value.identifier) &&
    isString(value.url) &&
    isString(value.storagePath) &&
    isString(value.checksum) &&
    isCount(value.bytes) &&
    KINDS.includes(value.kind) &&
    (value.pageCount === null || isCount(value.pageCount)) &&
    (value.textStats === "unknown" || isObject(value.textStats)) &&
    (value.scanOnly === undefined || typeof value.scanOnly === "boolean") &&
    isOptionalCount(value.position) &&
    isString(value.timestamp)
  );
}

export function isRunRecord(value: unknown): value is RunRecord {
  if (!isObject(value)) {
    return false;
  }
  return (
    value.type === "run" &&
    isString(value.runId) &&
    isString(value.startedAt) &&
    isString(value.finishedAt) &&
    (value.status === "completed" || value.status === "cancelled") &&
    isObject(value.summary)
  );
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  return isFetchAttempt(value) || isArchivedRecord(value) || isRunRecord(value);
}

/** Parses one serialized entry; anything unrecognised yields undefined. */
export function parseLedgerEntry(line: string): LedgerEntry | undefined {
  try {
    const parsed: unknown = JSON.parse(line);
    return isLedgerEntry(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function entryIdentifier(entry: LedgerEntry): string | undefined {
  return entry.type === "run" ? undefined : entry.identifier;
}
