import { ContentKind, TrustedHost } from "../types";

export type LedgerBackend = "jsonl" | "sqlite";

export interface AcceptedAssumptions {
  allowLicensed: boolean;
  acceptScanOnly: boolean;
}

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface VerificationConfig {
  acceptedKinds: ContentKind[];
  minBytes: number;
  minPages: number;
  maxPages: number;
  /** Below this many extracted characters a PDF counts as a scan without text. */
  minTextChars: number;
  /** When non-empty, text-bearing PDFs must mention at least one of these. */
  requiredTerms: string[];
  /** Reported in text statistics only. */
  keywords: string[];
}

export interface DiscoveryQuery {
  name: string;
  q: string;
  rows: number;
}

export interface DiscoveryConfig {
  apiUrl: string;
  linkGatewayUrl: string;
  fields: string;
  queries: DiscoveryQuery[];
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  concurrency: number;
  requestTimeoutMs: number;
  /** 0 disables the run-level deadline. */
  runTimeoutMs: number;
  maxRetries: number;
  backoff: BackoffConfig;
  hostIntervalMs: number;
  maxRedirects: number;
  maxDownloadBytes: number;
  landingPageLinks: number;
  deriveHints: boolean;
  quarantineFailed: boolean;
  accepted: AcceptedAssumptions;
  trustedHosts: TrustedHost[];
  extraTrustedHosts: string[];
  verification: VerificationConfig;
  ledgerBackend: LedgerBackend;
  outputDir: string;
  discovery: DiscoveryConfig;
}

export type ConfigOverrides = Partial<
  Omit<AppConfig, "backoff" | "accepted" | "verification" | "discovery">
> & {
  backoff?: Partial<BackoffConfig>;
  accepted?: Partial<AcceptedAssumptions>;
  verification?: Partial<VerificationConfig>;
  discovery?: Partial<DiscoveryConfig>;
};
