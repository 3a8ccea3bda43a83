export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  identifier?: string;
  url?: string;
  host?: string;
  retry?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "candidates_loaded"
  | "candidates_dropped"
  | "candidates_skipped"
  | "candidates_rejected"
  | "requests_sent"
  | "request_retries"
  | "verification_failed"
  | "archives_ok"
  | "archives_failed"
  | "archives_cancelled";

export type MetricTimerName = "request_ms" | "verify_ms" | "candidate_ms";
