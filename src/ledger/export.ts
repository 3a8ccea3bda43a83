import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { formatDelimited } from "../candidates/csv";
import { AttemptOutcome, LedgerEntry, RunRecord } from "../types";
import { ProvenanceLedger } from "./types";

export const LEDGER_CSV_HEADER = [
  "type",
  "runId",
  "identifier",
  "timestamp",
  "outcome",
  "url",
  "host",
  "statusCode",
  "errorClass",
  "error",
  "retries",
  "elapsedMs",
  "checksum",
  "bytes",
  "pageCount",
  "storagePath",
] as const;

function toRow(entry: LedgerEntry): unknown[] | undefined {
  if (entry.type === "attempt") {
    return [
      entry.type,
      entry.runId,
      entry.identifier,
      entry.timestamp,
      entry.outcome,
      entry.url,
      entry.host,
      entry.statusCode,
      entry.errorClass,
      entry.error,
      entry.retries,
      entry.elapsedMs,
      entry.checksum,
      entry.bytes,
      entry.pageCount,
      entry.quarantinePath,
    ];
  }
  if (entry.type === "archived") {
    return [
      entry.type,
      entry.runId,
      entry.identifier,
      entry.timestamp,
      "",
      entry.url,
      entry.host,
      "",
      "",
      "",
      "",
      "",
      entry.checksum,
      entry.bytes,
      entry.pageCount,
      entry.storagePath,
    ];
  }
  return undefined;
}

/**
 * Groups entries by run in the order runs first appear, then by the
 * candidate's input position, then by append order. Workers finish out of
 * order; the export does not.
 */
export function orderForExport(entries: readonly LedgerEntry[]): LedgerEntry[] {
  const runRank = new Map<string, number>();
  for (const entry of entries) {
    if (!runRank.has(entry.runId)) {
      runRank.set(entry.runId, runRank.size);
    }
  }
  const positionOf = (entry: LedgerEntry): number =>
    entry.type !== "run" && entry.position !== undefined ? entry.position : Number.MAX_SAFE_INTEGER;

  return entries
    .map((entry, seq) => ({ entry, seq }))
    .sort(
      (a, b) =>
        (runRank.get(a.entry.runId) ?? 0) - (runRank.get(b.entry.runId) ?? 0) ||
        positionOf(a.entry) - positionOf(b.entry) ||
        a.seq - b.seq,
    )
    .map(({ entry }) => entry);
}

export function formatLedgerCsv(entries: readonly LedgerEntry[]): string {
  const rows = orderForExport(entries).flatMap((entry) => {
    const row = toRow(entry);
    return row ? [row] : [];
  });
  return formatDelimited(LEDGER_CSV_HEADER, rows);
}

/** Regenerates the CSV view of the ledger; the previous file is replaced atomically. */
export async function exportLedgerCsv(ledger: ProvenanceLedger, outputPath: string): Promise<number> {
  const entries = await ledger.entries();
  const absolutePath = path.resolve(outputPath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  const tempPath = `${absolutePath}.${crypto.randomBytes(4).toString("hex")}.part`;
  await fs.promises.writeFile(tempPath, formatLedgerCsv(entries), "utf-8");
  await fs.promises.rename(tempPath, absolutePath);
  return entries.filter((entry) => entry.type !== "run").length;
}

export interface LedgerStats {
  entries: number;
  activeRecords: number;
  attempts: Record<AttemptOutcome, number>;
  recentRuns: RunRecord[];
}

export async function summarizeLedger(ledger: ProvenanceLedger, recentRunLimit = 5): Promise<LedgerStats> {
  const entries = await ledger.entries();
  const attempts: Record<AttemptOutcome, number> = { success: 0, failure: 0, skipped: 0, rejected: 0, cancelled: 0 };
  const runs: RunRecord[] = [];
  for (const entry of entries) {
    if (entry.type === "attempt") {
      attempts[entry.outcome] += 1;
    } else if (entry.type === "run") {
      runs.push(entry);
    }
  }

  return {
    entries: entries.length,
    activeRecords: (await ledger.activeRecords()).length,
    attempts,
    recentRuns: runs.slice(-recentRunLimit).reverse(),
  };
}
