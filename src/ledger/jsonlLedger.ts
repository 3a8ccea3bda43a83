import fs from "node:fs";
import path from "node:path";
import { Logger, createSilentLogger } from "../observability";
import { ArchivedRecord, LedgerEntry } from "../types";
import { parseLedgerEntry } from "./entries";
import { ProvenanceLedger } from "./types";

interface ReplayResult {
  entries: LedgerEntry[];
  /** Length of the prefix that ends with the last complete line. */
  validBytes: number;
  totalBytes: number;
  unreadableLines: number;
}

function replay(filePath: string): ReplayResult {
  if (!fs.existsSync(filePath)) {
    return { entries: [], validBytes: 0, totalBytes: 0, unreadableLines: 0 };
  }

  const content = fs.readFileSync(filePath);
  const lastNewline = content.lastIndexOf(0x0a);
  const validBytes = lastNewline + 1;
  const entries: LedgerEntry[] = [];
  let unreadableLines = 0;

  for (const line of content.subarray(0, validBytes).toString("utf-8").split("\n")) {
    if (line.trim() === "") {
      continue;
    }
    const entry = parseLedgerEntry(line);
    if (entry) {
      entries.push(entry);
    } else {
      unreadableLines += 1;
    }
  }

  return { entries, validBytes, totalBytes: content.length, unreadableLines };
}

/**
 * JSON Lines ledger. Each `record` is one synchronous write followed by
 * fsync. A trailing partial line left by a crash is cut off on open.
 */
export class JsonlLedger implements ProvenanceLedger {
  readonly location: string;
  private fd: number | undefined;
  private readonly active = new Map<string, ArchivedRecord>();

  constructor(filePath: string, logger: Logger = createSilentLogger("ledger")) {
    this.location = path.resolve(filePath);
    fs.mkdirSync(path.dirname(this.location), { recursive: true });

    const replayed = replay(this.location);
    if (replayed.validBytes < replayed.totalBytes) {
      fs.truncateSync(this.location, replayed.validBytes);
      logger.warn("ledger_torn_tail_truncated", {
        path: this.location,
        droppedBytes: replayed.totalBytes - replayed.validBytes,
      });
    }
    if (replayed.unreadableLines > 0) {
      logger.warn("ledger_unreadable_lines", { path: this.location, count: replayed.unreadableLines });
    }

    for (const entry of replayed.entries) {
      this.index(entry);
    }
    this.fd = fs.openSync(this.location, "a");
  }

  async record(entry: LedgerEntry): Promise<void> {
    if (this.fd === undefined) {
      throw new Error(`Ledger is closed: ${this.location}`);
    }
    const data = Buffer.from(`${JSON.stringify(entry)}\n`, "utf-8");
    let offset = 0;
    while (offset < data.length) {
      offset += fs.writeSync(this.fd, data, offset);
    }
    fs.fsyncSync(this.fd);
    this.index(entry);
  }

  async hasActiveRecord(identifier: string): Promise<boolean> {
    return this.active.has(identifier);
  }

  async activeRecord(identifier: string): Promise<ArchivedRecord | undefined> {
    return this.active.get(identifier);
  }

  async activeRecords(): Promise<ArchivedRecord[]> {
    return [...this.active.values()];
  }

  async entries(): Promise<LedgerEntry[]> {
    return replay(this.location).entries;
  }

  async close(): Promise<void> {
    if (this.fd !== undefined) {
      fs.closeSync(this.fd);
      this.fd = undefined;
    }
  }

  private index(entry: LedgerEntry): void {
    if (entry.type === "archived") {
      this.active.delete(entry.identifier);
      this.active.set(entry.identifier, entry);
    }
  }
}
