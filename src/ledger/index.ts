import path from "node:path";
import { LedgerBackend } from "../config";
import { Logger } from "../observability";
import { JsonlLedger } from "./jsonlLedger";
import { SqliteLedger } from "./sqliteLedger";
import { ProvenanceLedger } from "./types";

export function ledgerPath(outputDir: string, backend: LedgerBackend): string {
  return path.join(outputDir, backend === "sqlite" ? "ledger.sqlite" : "ledger.jsonl");
}

export function createLedger(outputDir: string, backend: LedgerBackend, logger: Logger): ProvenanceLedger {
  const location = ledgerPath(outputDir, backend);
  if (backend === "sqlite") {
    return new SqliteLedger(location, logger);
  }
  return new JsonlLedger(location, logger);
}

export * from "./entries";
export * from "./export";
export * from "./jsonlLedger";
export * from "./sqliteLedger";
export * from "./types";
