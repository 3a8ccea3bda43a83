import path from "node:path";
import { AppConfig } from "../config";
import { runDiscover, DiscoverResult } from "../discovery";
import { LedgerStats, ProvenanceLedger, exportLedgerCsv, summarizeLedger } from "../ledger";
import { Logger, MetricsRegistry } from "../observability";
import { ArchiveRunResult, runArchive } from "../orchestrator";
import { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  signal: AbortSignal;
  fetchFn?: FetchFn;
}

export interface ArchiveCommandOptions {
  sourcePath: string;
  force: boolean;
  maxCandidates?: number;
}

export async function runArchiveCommand(
  ctx: CommandContext,
  ledger: ProvenanceLedger,
  options: ArchiveCommandOptions,
): Promise<ArchiveRunResult> {
  ctx.logger.info("archive_start", { source: options.sourcePath, force: options.force, maxCandidates: options.maxCandidates });
  const result = await runArchive({
    runId: ctx.runId,
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    ledger,
    source: { path: options.sourcePath },
    force: options.force,
    signal: ctx.signal,
    ...(options.maxCandidates !== undefined ? { maxCandidates: options.maxCandidates } : {}),
    ...(ctx.fetchFn ? { fetchFn: ctx.fetchFn } : {}),
  });
  ctx.logger.info("archive_complete", { status: result.status, ...result.summary, export: result.exportPath });
  return result;
}

export interface DiscoverCommandOptions {
  masterPath: string;
  token: string | undefined;
}

export async function runDiscoverCommand(ctx: CommandContext, options: DiscoverCommandOptions): Promise<DiscoverResult> {
  ctx.logger.info("discover_start", { master: options.masterPath, queries: ctx.config.discovery.queries.length });
  return runDiscover({
    config: ctx.config,
    logger: ctx.logger,
    token: options.token,
    masterPath: options.masterPath,
    outputDir: ctx.config.outputDir,
    signal: ctx.signal,
    ...(ctx.fetchFn ? { fetchFn: ctx.fetchFn } : {}),
  });
}

export async function runStatus(ctx: CommandContext, ledger: ProvenanceLedger): Promise<LedgerStats> {
  ctx.logger.info("status_start", { ledger: ledger.location });
  const stats = await summarizeLedger(ledger);
  ctx.logger.info("status_complete", { stats });
  return stats;
}

export async function runExport(ctx: CommandContext, ledger: ProvenanceLedger): Promise<string> {
  const outputPath = path.join(ctx.config.outputDir, "ledger.csv");
  const rows = await exportLedgerCsv(ledger, outputPath);
  ctx.logger.info("export_complete", { path: outputPath, rows });
  return outputPath;
}
