import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { archivedEntry, attemptEntry, runEntry } from "../testing/entries";
import { makeTempDir, removeDir } from "../testing/fixtures";
import { LEDGER_CSV_HEADER, exportLedgerCsv, formatLedgerCsv, orderForExport, summarizeLedger } from "./export";
import { JsonlLedger } from "./jsonlLedger";

const checksum = "ab".repeat(32);

describe("formatLedgerCsv", () => {
  it("writes attempts and archived records and leaves run records out", () => {
    const csv = formatLedgerCsv([
      attemptEntry({
        outcome: "failure",
        errorClass: "verification",
        error: "too_small:100, html",
        checksum,
        bytes: 100,
        quarantinePath: "quarantine/A-abababababab.pdf",
      }),
      archivedEntry({ pageCount: null }),
      runEntry(),
    ]);

    expect(csv.split("\n")).toEqual([
      LEDGER_CSV_HEADER.join(","),
      `attempt,run-1,A,2026-01-01T00:00:00.000Z,failure,https://a.example.org/a.pdf,a.example.org,200,verification,"too_small:100, html",0,12,${checksum},100,,quarantine/A-abababababab.pdf`,
      `archived,run-1,A,2026-01-01T00:00:01.000Z,,https://a.example.org/a.pdf,a.example.org,,,,,,${checksum},2048,,archive/ab/${checksum}.pdf`,
      "",
    ]);
  });
});

describe("orderForExport", () => {
  it("orders by run, then input position, then append order", () => {
    const ordered = orderForExport([
      attemptEntry({ identifier: "B", position: 1, outcome: "rejected" }),
      attemptEntry({ identifier: "A", position: 0 }),
      archivedEntry({ position: 0 }),
      runEntry(),
      attemptEntry({ runId: "run-2", identifier: "C", position: 1, outcome: "cancelled" }),
      attemptEntry({ runId: "run-2", identifier: "B", position: 0, outcome: "failure" }),
      attemptEntry({ runId: "run-2", identifier: "B", position: 0, outcome: "success" }),
    ]);

    expect(
      ordered.map((entry) =>
        entry.type === "run"
          ? `${entry.runId}:run`
          : `${entry.runId}:${entry.identifier}:${entry.type === "attempt" ? entry.outcome : "archived"}`,
      ),
    ).toEqual([
      "run-1:A:success",
      "run-1:A:archived",
      "run-1:B:rejected",
      "run-1:run",
      "run-2:B:failure",
      "run-2:B:success",
      "run-2:C:cancelled",
    ]);
  });
});

describe("ledger export and stats", () => {
  let dir: string;
  let ledger: JsonlLedger;

  beforeEach(async () => {
    dir = makeTempDir();
    ledger = new JsonlLedger(path.join(dir, "ledger.jsonl"));
    await ledger.record(attemptEntry());
    await ledger.record(archivedEntry());
    await ledger.record(runEntry());
    await ledger.record(attemptEntry({ identifier: "B", outcome: "rejected", runId: "run-2" }));
    await ledger.record(runEntry({ runId: "run-2", status: "cancelled" }));
  });

  afterEach(async () => {
    await ledger.close();
    removeDir(dir);
  });

  it("writes the CSV file and reports the row count", async () => {
    const outputPath = path.join(dir, "exports", "ledger.csv");

    const rows = await exportLedgerCsv(ledger, outputPath);

    expect(rows).toBe(3);
    expect(fs.readFileSync(outputPath, "utf-8").trimEnd().split("\n")).toHaveLength(4);
    expect(fs.readdirSync(path.dirname(outputPath))).toEqual(["ledger.csv"]);
  });

  it("counts attempts by outcome and lists the newest runs first", async () => {
    const stats = await summarizeLedger(ledger);

    expect(stats).toMatchObject({
      entries: 5,
      activeRecords: 1,
      attempts: { success: 1, failure: 0, skipped: 0, rejected: 1, cancelled: 0 },
    });
    expect(stats.recentRuns.map((run) => run.runId)).toEqual(["run-2", "run-1"]);
    expect((await summarizeLedger(ledger, 1)).recentRuns.map((run) => run.runId)).toEqual(["run-2"]);
  });
});
