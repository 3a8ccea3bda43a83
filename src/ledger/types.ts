import { ArchivedRecord, LedgerEntry } from "../types";

/**
 * Append-only provenance log. `record` resolves once the entry is durable.
 * Only the run's ledger consumer writes; everything else reads.
 */
export interface ProvenanceLedger {
  readonly location: string;
  record(entry: LedgerEntry): Promise<void>;
  hasActiveRecord(identifier: string): Promise<boolean>;
  /** The most recent ArchivedRecord for the identifier. */
  activeRecord(identifier: string): Promise<ArchivedRecord | undefined>;
  activeRecords(): Promise<ArchivedRecord[]>;
  entries(): Promise<LedgerEntry[]>;
  close(): Promise<void>;
}
