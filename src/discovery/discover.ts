import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { formatDelimited } from "../candidates/csv";
import { ConfigurationError, errorMessage } from "../core/errors";
import { FetchFn, getFetchDispatcher } from "../core/fetch";
import { Logger } from "../observability";
import { CANDIDATE_ROW_HEADER, CandidateRow, dedupeRows, findMissing, parseMasterCatalog, toCandidateRows } from "./catalog";
import { searchIndex } from "./indexClient";

export interface DiscoverDeps {
  config: AppConfig;
  logger: Logger;
  token: string | undefined;
  masterPath: string;
  outputDir: string;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
}

export interface DiscoverResult {
  candidates: number;
  missing: number;
  failedQueries: string[];
  allCandidatesPath: string;
  missingPath: string;
  queryLogPath: string;
}

function rowsToCsv(rows: readonly CandidateRow[]): string {
  return formatDelimited(
    CANDIDATE_ROW_HEADER,
    rows.map((row) => CANDIDATE_ROW_HEADER.map((key) => row[key])),
  );
}

function readMaster(masterPath: string): string {
  try {
    return fs.readFileSync(path.resolve(masterPath), "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read master catalog ${masterPath}: ${errorMessage(error)}`);
  }
}

/**
 * Runs every configured index query, keeps going past a failing one, and
 * writes the union of results plus the subset missing from the master
 * catalog. The master catalog is only read.
 */
export async function runDiscover(deps: DiscoverDeps): Promise<DiscoverResult> {
  const { config, logger } = deps;
  const token = deps.token?.trim();
  if (!token) {
    throw new ConfigurationError("ADS_TOKEN is not set");
  }
  if (config.discovery.queries.length === 0) {
    throw new ConfigurationError("discovery.queries is empty; add queries to the config file");
  }
  const master = parseMasterCatalog(readMaster(deps.masterPath));

  const collected: CandidateRow[] = [];
  const logLines: string[] = [];
  const failedQueries: string[] = [];
  for (const query of config.discovery.queries) {
    try {
      const result = await searchIndex(query, {
        token,
        discovery: config.discovery,
        userAgent: config.userAgent,
        timeoutMs: config.requestTimeoutMs,
        dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
        ...(deps.fetchFn ? { fetchFn: deps.fetchFn } : {}),
        ...(deps.signal ? { signal: deps.signal } : {}),
      });
      const rows = toCandidateRows(result.docs, config.discovery.linkGatewayUrl);
      collected.push(...rows);
      logLines.push(`[${query.name}] numFound=${result.numFound} rows_collected=${rows.length}`);
      logger.info("discover_query_ok", { query: query.name, numFound: result.numFound, rows: rows.length });
    } catch (error) {
      failedQueries.push(query.name);
      logLines.push(`[${query.name}] ERROR: ${errorMessage(error)}`);
      logger.warn("discover_query_failed", { query: query.name, error: errorMessage(error) });
    }
  }

  const unique = dedupeRows(collected);
  const missing = findMissing(unique, master);

  const outputDir = path.resolve(deps.outputDir);
  await fs.promises.mkdir(outputDir, { recursive: true });
  const allCandidatesPath = path.join(outputDir, "all_candidates.csv");
  const missingPath = path.join(outputDir, "missing_only.csv");
  const queryLogPath = path.join(outputDir, "queries.log");
  await fs.promises.writeFile(allCandidatesPath, rowsToCsv(unique), "utf-8");
  await fs.promises.writeFile(missingPath, rowsToCsv(missing), "utf-8");
  await fs.promises.writeFile(queryLogPath, `${logLines.join("\n")}\n`, "utf-8");

  logger.info("discover_complete", { candidates: unique.length, missing: missing.length, masterEntries: master.length });
  return { candidates: unique.length, missing: missing.length, failedQueries, allCandidatesPath, missingPath, queryLogPath };
}
