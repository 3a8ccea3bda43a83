import fs from "node:fs";
import path from "node:path";
import { ConfigurationError, errorMessage } from "../core/errors";
import { DEFAULT_TRUSTED_HOSTS, parseTrustedHosts } from "../policy";
import { ContentKind } from "../types";
import { AppConfig, ConfigOverrides } from "./types";

const CONTENT_KINDS: readonly ContentKind[] = ["pdf", "tiff", "jpeg", "png"];

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "primary-preserver/1.0 (+mailto:archive-operator@example.org)",
  ignoreHttpsErrors: false,
  concurrency: 3,
  requestTimeoutMs: 60_000,
  runTimeoutMs: 0,
  maxRetries: 3,
  backoff: {
    baseDelayMs: 1_000,
    maxDelayMs: 60_000,
    jitterMs: 1_000,
  },
  hostIntervalMs: 1_500,
  maxRedirects: 5,
  maxDownloadBytes: 200 * 1024 * 1024,
  landingPageLinks: 3,
  deriveHints: true,
  quarantineFailed: true,
  accepted: {
    allowLicensed: false,
    acceptScanOnly: false,
  },
  trustedHosts: [...DEFAULT_TRUSTED_HOSTS],
  extraTrustedHosts: [],
  verification: {
    acceptedKinds: ["pdf", "tiff", "jpeg", "png"],
    minBytes: 1_024,
    minPages: 1,
    maxPages: 200,
    minTextChars: 100,
    requiredTerms: [],
    keywords: [],
  },
  ledgerBackend: "jsonl",
  outputDir: "data/archive-run",
  discovery: {
    apiUrl: "https://api.adsabs.harvard.edu/v1/search/query",
    linkGatewayUrl: "https://ui.adsabs.harvard.edu/link_gateway",
    fields: "bibcode,title,year,doi",
    queries: [],
  },
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${absolutePath} (${errorMessage(error)})`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    trustedHosts: fileConfig.trustedHosts ? parseTrustedHosts(fileConfig.trustedHosts) : DEFAULT_CONFIG.trustedHosts,
    backoff: { ...DEFAULT_CONFIG.backoff, ...(fileConfig.backoff ?? {}) },
    accepted: { ...DEFAULT_CONFIG.accepted, ...(fileConfig.accepted ?? {}) },
    verification: { ...DEFAULT_CONFIG.verification, ...(fileConfig.verification ?? {}) },
    discovery: { ...DEFAULT_CONFIG.discovery, ...(fileConfig.discovery ?? {}) },
  };

  const config: AppConfig = {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    concurrency: toInt(env.CONCURRENCY, merged.concurrency),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    runTimeoutMs: toInt(env.RUN_TIMEOUT_MS, merged.runTimeoutMs),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    ledgerBackend:
      env.LEDGER_BACKEND === "jsonl" || env.LEDGER_BACKEND === "sqlite" ? env.LEDGER_BACKEND : merged.ledgerBackend,
    accepted: {
      allowLicensed: toBool(env.ALLOW_LICENSED, merged.accepted.allowLicensed),
      acceptScanOnly: toBool(env.ACCEPT_SCAN_ONLY, merged.accepted.acceptScanOnly),
    },
    discovery: {
      ...merged.discovery,
      apiUrl: env.ADS_API_URL ?? merged.discovery.apiUrl,
    },
  };

  validateConfig(config);
  return config;
}

function isNonNegativeInt(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/** Throws one ConfigurationError naming every invalid setting. */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];
  const requireInt = (name: string, value: unknown, min: number): void => {
    if (!isNonNegativeInt(value) || (typeof value === "number" && value < min)) {
      problems.push(`${name} must be an integer >= ${min}`);
    }
  };

  requireInt("concurrency", config.concurrency, 1);
  requireInt("requestTimeoutMs", config.requestTimeoutMs, 1);
  requireInt("runTimeoutMs", config.runTimeoutMs, 0);
  requireInt("maxRetries", config.maxRetries, 0);
  requireInt("backoff.baseDelayMs", config.backoff.baseDelayMs, 0);
  requireInt("backoff.maxDelayMs", config.backoff.maxDelayMs, 0);
  requireInt("backoff.jitterMs", config.backoff.jitterMs, 0);
  requireInt("hostIntervalMs", config.hostIntervalMs, 0);
  requireInt("maxRedirects", config.maxRedirects, 0);
  requireInt("maxDownloadBytes", config.maxDownloadBytes, 1);
  requireInt("landingPageLinks", config.landingPageLinks, 0);
  requireInt("verification.minBytes", config.verification.minBytes, 1);
  requireInt("verification.minPages", config.verification.minPages, 0);
  requireInt("verification.maxPages", config.verification.maxPages, 1);
  requireInt("verification.minTextChars", config.verification.minTextChars, 0);

  if (config.backoff.maxDelayMs < config.backoff.baseDelayMs) {
    problems.push("backoff.maxDelayMs must be >= backoff.baseDelayMs");
  }
  if (config.verification.maxPages < config.verification.minPages) {
    problems.push("verification.maxPages must be >= verification.minPages");
  }
  const kinds: unknown[] = Array.isArray(config.verification.acceptedKinds) ? config.verification.acceptedKinds : [];
  if (kinds.length === 0 || !kinds.every((kind) => CONTENT_KINDS.some((known) => known === kind))) {
    problems.push(`verification.acceptedKinds must be a non-empty subset of ${CONTENT_KINDS.join(", ")}`);
  }
  if (config.ledgerBackend !== "jsonl" && config.ledgerBackend !== "sqlite") {
    problems.push("ledgerBackend must be jsonl or sqlite");
  }
  if (typeof config.outputDir !== "string" || config.outputDir.trim() === "") {
    problems.push("outputDir must be a non-empty path");
  }
  if (!Array.isArray(config.extraTrustedHosts) || !config.extraTrustedHosts.every((host) => typeof host === "string")) {
    problems.push("extraTrustedHosts must be a list of hostnames");
  }

  const queries: unknown[] = Array.isArray(config.discovery.queries) ? config.discovery.queries : [{}];
  queries.forEach((query, index) => {
    const name: unknown = query && typeof query === "object" ? Reflect.get(query, "name") : undefined;
    const q: unknown = query && typeof query === "object" ? Reflect.get(query, "q") : undefined;
    const rows: unknown = query && typeof query === "object" ? Reflect.get(query, "rows") : undefined;
    if (typeof name !== "string" || typeof q !== "string" || !isNonNegativeInt(rows) || rows === 0) {
      problems.push(`discovery.queries[${index}] needs a name, a q string and rows >= 1`);
    }
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }
}

export { DEFAULT_CONFIG };
