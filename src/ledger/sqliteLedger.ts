import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { Logger, createSilentLogger } from "../observability";
import { ArchivedRecord, LedgerEntry } from "../types";
import { entryIdentifier, isArchivedRecord, parseLedgerEntry } from "./entries";
import { ProvenanceLedger } from "./types";

type PayloadRow = {
  payload: string;
};

type InsertParams = {
  type: LedgerEntry["type"];
  identifier: string | null;
  runId: string;
  recordedAt: string;
  payload: string;
};

/**
 * SQLite ledger. Rows are never updated; `seq` gives the append order and the
 * newest archived row per identifier is the active record.
 */
export class SqliteLedger implements ProvenanceLedger {
  readonly location: string;
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(dbPath: string, logger: Logger = createSilentLogger("ledger")) {
    this.location = path.resolve(dbPath);
    this.logger = logger;
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    this.db = new Database(this.location);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");
    this.initializeSchema();
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.db
      .prepare<InsertParams>(
        `
        INSERT INTO ledger_entries (type, identifier, runId, recordedAt, payload)
        VALUES (@type, @identifier, @runId, @recordedAt, @payload)
      `,
      )
      .run({
        type: entry.type,
        identifier: entryIdentifier(entry) ?? null,
        runId: entry.runId,
        recordedAt: new Date().toISOString(),
        payload: JSON.stringify(entry),
      });
  }

  async hasActiveRecord(identifier: string): Promise<boolean> {
    return (await this.activeRecord(identifier)) !== undefined;
  }

  async activeRecord(identifier: string): Promise<ArchivedRecord | undefined> {
    const row = this.db
      .prepare<[string], PayloadRow>(
        `
        SELECT payload FROM ledger_entries
        WHERE type = 'archived' AND identifier = ?
        ORDER BY seq DESC
        LIMIT 1
      `,
      )
      .get(identifier);
    return row ? this.toArchived(row.payload) : undefined;
  }

  async activeRecords(): Promise<ArchivedRecord[]> {
    const rows = this.db
      .prepare<[], PayloadRow>(
        `
        SELECT e.payload FROM ledger_entries e
        WHERE e.type = 'archived'
          AND e.seq = (
            SELECT MAX(latest.seq) FROM ledger_entries latest
            WHERE latest.type = 'archived' AND latest.identifier = e.identifier
          )
        ORDER BY e.seq ASC
      `,
      )
      .all();
    return rows.flatMap((row) => {
      const record = this.toArchived(row.payload);
      return record ? [record] : [];
    });
  }

  async entries(): Promise<LedgerEntry[]> {
    const rows = this.db.prepare<[], PayloadRow>("SELECT payload FROM ledger_entries ORDER BY seq ASC").all();
    const entries: LedgerEntry[] = [];
    for (const row of rows) {
      const entry = parseLedgerEntry(row.payload);
      if (entry) {
        entries.push(entry);
      } else {
        this.logger.warn("ledger_unreadable_row", { path: this.location });
      }
    }
    return entries;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private toArchived(payload: string): ArchivedRecord | undefined {
    const entry = parseLedgerEntry(payload);
    return isArchivedRecord(entry) ? entry : undefined;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        type TEXT NOT NULL,
        identifier TEXT,
        runId TEXT NOT NULL,
        recordedAt TEXT NOT NULL,
        payload TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_identifier ON ledger_entries(identifier, type, seq);
      CREATE INDEX IF NOT EXISTS idx_ledger_run ON ledger_entries(runId, seq);
    `);
  }
}
