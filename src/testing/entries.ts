import { ArchivedRecord, FetchAttempt, RunRecord } from "../types";

export function attemptEntry(overrides: Partial<FetchAttempt> = {}): FetchAttempt {
  return {
    type: "attempt",
    runId: "run-1",
    identifier: "A",
    url: "https://a.example.org/a.pdf",
    host: "a.example.org",
    timestamp: "2026-01-01T00:00:00.000Z",
    outcome: "success",
    statusCode: 200,
    elapsedMs: 12,
    retries: 0,
    ...overrides,
  };
}

export function archivedEntry(overrides: Partial<ArchivedRecord> = {}): ArchivedRecord {
  const checksum = overrides.checksum ?? "ab".repeat(32);
  return {
    type: "archived",
    runId: "run-1",
    identifier: "A",
    url: "https://a.example.org/a.pdf",
    sourceUrl: "https://a.example.org/a.pdf",
    host: "a.example.org",
    storagePath: `archive/${checksum.slice(0, 2)}/${checksum}.pdf`,
    checksum,
    bytes: 2048,
    contentType: "application/pdf",
    kind: "pdf",
    pageCount: 3,
    textStats: { characters: 120, words: 20, hasText: true, matchedKeywords: [] },
    timestamp: "2026-01-01T00:00:01.000Z",
    ...overrides,
  };
}

export function runEntry(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    type: "run",
    runId: "run-1",
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:05.000Z",
    status: "completed",
    summary: { total: 1, attempted: 1, succeeded: 1, skipped: 0, rejected: 0, failed: 0, cancelled: 0 },
    ...overrides,
  };
}
