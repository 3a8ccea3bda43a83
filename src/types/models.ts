export type Assumption = "licensed" | "scan_only";

export interface TrustedHost {
  hostname: string;
  requires: Assumption[];
}

export interface Candidate {
  identifier: string;
  title: string;
  year: number;
  doi?: string;
  bibcode?: string;
  urlHints: string[];
}

export type ContentKind = "pdf" | "tiff" | "jpeg" | "png";

export interface TextStats {
  characters: number;
  words: number;
  hasText: boolean;
  matchedKeywords: string[];
}

export type AttemptOutcome = "success" | "failure" | "skipped" | "rejected" | "cancelled";

export type ErrorClass =
  | "policy_rejection"
  | "transient_network"
  | "network"
  | "http_client"
  | "verification"
  | "cancelled"
  | "already_archived"
  | "internal";

export interface FetchAttempt {
  type: "attempt";
  runId: string;
  identifier: string;
  /** Candidate's position in its run's input; orders exports independently of completion order. */
  position?: number;
  url: string;
  host: string;
  timestamp: string;
  outcome: AttemptOutcome;
  statusCode?: number;
  errorClass?: ErrorClass;
  error?: string;
  elapsedMs: number;
  retries: number;
  checksum?: string;
  bytes?: number;
  pageCount?: number;
  quarantinePath?: string;
}

export interface ArchivedRecord {
  type: "archived";
  runId: string;
  identifier: string;
  url: string;
  sourceUrl: string;
  host: string;
  storagePath: string;
  checksum: string;
  bytes: number;
  contentType?: string;
  kind: ContentKind;
  pageCount: number | null;
  textStats: TextStats | "unknown";
  /** Accepted as a scan without extractable text under the run's scan-only assumption. */
  scanOnly?: boolean;
  position?: number;
  timestamp: string;
  supersedes?: string;
}

export interface RunSummary {
  total: number;
  attempted: number;
  succeeded: number;
  skipped: number;
  rejected: number;
  failed: number;
  cancelled: number;
}

export interface RunRecord {
  type: "run";
  runId: string;
  startedAt: string;
  finishedAt: string;
  status: "completed" | "cancelled";
  summary: RunSummary;
}

export type LedgerEntry = FetchAttempt | ArchivedRecord | RunRecord;
