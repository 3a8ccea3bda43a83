import path from "node:path";
import { AppConfig } from "../config";
import { CancelledError, cancellationOf, errorMessage, toErrorClass } from "../core/errors";
import { FetchFn, defaultFetch, getFetchDispatcher } from "../core/fetch";
import { LoadDiagnostic, SourceFormat, loadCandidates } from "../candidates";
import {
  CandidateResult,
  Channel,
  HostGate,
  WorkItem,
  WorkerContext,
  archiveCandidate,
  runWorkerPool,
} from "../download";
import { ProvenanceLedger, exportLedgerCsv } from "../ledger";
import { Logger, MetricsRegistry } from "../observability";
import { TrustPolicy, hostOf } from "../policy";
import { ArchiveStore } from "../storage";
import { Candidate, FetchAttempt, LedgerEntry, RunRecord, RunSummary } from "../types";
import { ContentVerifier } from "../verify";

export type CandidateSource = { path: string; format?: SourceFormat } | { candidates: Candidate[] };

export interface ArchiveRunDeps {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  ledger: ProvenanceLedger;
  source: CandidateSource;
  /** Re-fetch identifiers that already have an active record. */
  force?: boolean;
  maxCandidates?: number;
  /** Operator cancellation; combined with `config.runTimeoutMs`. */
  signal?: AbortSignal;
  fetchFn?: FetchFn;
  policy?: TrustPolicy;
  verifier?: ContentVerifier;
  store?: ArchiveStore;
  gate?: HostGate;
  random?: () => number;
}

export interface ArchiveRunResult {
  runId: string;
  status: RunRecord["status"];
  summary: RunSummary;
  /** One result per candidate, in input order. */
  results: CandidateResult[];
  diagnostics: LoadDiagnostic[];
  exportPath: string;
}

interface RunSignal {
  signal: AbortSignal;
  abort(reason: Error): void;
  dispose(): void;
}

function createRunSignal(parent: AbortSignal | undefined, runTimeoutMs: number): RunSignal {
  const controller = new AbortController();
  const onParentAbort = (): void => {
    if (parent) {
      controller.abort(cancellationOf(parent));
    }
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer =
    runTimeoutMs > 0
      ? setTimeout(() => controller.abort(new CancelledError(`run timeout after ${runTimeoutMs}ms`)), runTimeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    abort: (reason) => controller.abort(reason),
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

async function loadSource(
  source: CandidateSource,
  config: AppConfig,
): Promise<{ candidates: Candidate[]; diagnostics: LoadDiagnostic[] }> {
  if ("candidates" in source) {
    return { candidates: source.candidates, diagnostics: [] };
  }
  return loadCandidates(source.path, {
    ...(source.format ? { format: source.format } : {}),
    deriveHints: config.deriveHints,
    linkGatewayUrl: config.discovery.linkGatewayUrl,
  });
}

async function consumeLedger(channel: Channel<LedgerEntry>, ledger: ProvenanceLedger): Promise<void> {
  for await (const entry of channel) {
    await ledger.record(entry);
  }
}

export function summarizeResults(results: readonly CandidateResult[], attempted: number): RunSummary {
  const count = (...statuses: CandidateResult["status"][]): number =>
    results.filter((result) => statuses.includes(result.status)).length;
  return {
    total: results.length,
    attempted,
    succeeded: count("archived", "unchanged"),
    skipped: count("skipped"),
    rejected: count("rejected"),
    failed: count("failed"),
    cancelled: count("cancelled"),
  };
}

/**
 * One archive run: load, skip identifiers with an active record unless
 * forced, filter hints through the trust policy, fan out to the worker pool
 * and funnel every ledger entry through a single consumer.
 */
export async function runArchive(deps: ArchiveRunDeps): Promise<ArchiveRunResult> {
  const { runId, config, logger, metrics, ledger } = deps;
  const startedAt = new Date().toISOString();
  const policy = deps.policy ?? new TrustPolicy(config.trustedHosts, config.extraTrustedHosts);
  const assumptions = { ...config.accepted };
  const store = deps.store ?? new ArchiveStore(config.outputDir);
  const verifier = deps.verifier ?? new ContentVerifier(config.verification, { logger: logger.child("verify") });

  const loaded = await loadSource(deps.source, config);
  for (const diagnostic of loaded.diagnostics) {
    metrics.incrementCounter("candidates_dropped", 1);
    logger.warn("candidate_dropped", { ...diagnostic });
  }
  const candidates =
    deps.maxCandidates !== undefined ? loaded.candidates.slice(0, deps.maxCandidates) : loaded.candidates;
  metrics.incrementCounter("candidates_loaded", candidates.length);
  logger.info("archive_run_start", {
    candidates: candidates.length,
    force: Boolean(deps.force),
    allowLicensed: assumptions.allowLicensed,
    acceptScanOnly: assumptions.acceptScanOnly,
    ledger: ledger.location,
  });

  const run = createRunSignal(deps.signal, config.runTimeoutMs);
  const channel = new Channel<LedgerEntry>();
  let ledgerFailure: unknown;
  const consumer = consumeLedger(channel, ledger).catch((error: unknown) => {
    ledgerFailure = error;
    logger.error("ledger_write_failed", { error: errorMessage(error) });
    run.abort(new CancelledError("ledger write failed"));
  });

  const attempt = (
    candidate: Candidate,
    position: number,
    fields: Omit<FetchAttempt, "type" | "runId" | "identifier" | "position" | "timestamp">,
  ) => {
    channel.push({
      type: "attempt",
      runId,
      identifier: candidate.identifier,
      position,
      timestamp: new Date().toISOString(),
      ...fields,
    });
  };

  try {
    const results = new Map<number, CandidateResult>();
    const work: WorkItem[] = [];

    for (const [index, candidate] of candidates.entries()) {
      const active = await ledger.activeRecord(candidate.identifier);
      if (active && !deps.force) {
        attempt(candidate, index, {
          url: active.url,
          host: active.host,
          outcome: "skipped",
          errorClass: "already_archived",
          elapsedMs: 0,
          retries: 0,
          checksum: active.checksum,
        });
        metrics.incrementCounter("candidates_skipped", 1);
        logger.info("archive_candidate_skipped", { identifier: candidate.identifier, checksum: active.checksum });
        results.set(index, {
          identifier: candidate.identifier,
          status: "skipped",
          url: active.url,
          checksum: active.checksum,
          storagePath: active.storagePath,
          errorClass: "already_archived",
        });
        continue;
      }

      const hints: string[] = [];
      const reasons: string[] = [];
      for (const hint of candidate.urlHints) {
        const decision = policy.isTrusted(hint, assumptions);
        if (decision.allowed) {
          hints.push(hint);
          continue;
        }
        reasons.push(decision.reason);
        attempt(candidate, index, {
          url: hint,
          host: decision.host,
          outcome: "rejected",
          errorClass: "policy_rejection",
          error: decision.reason,
          elapsedMs: 0,
          retries: 0,
        });
      }

      if (hints.length === 0) {
        metrics.incrementCounter("candidates_rejected", 1);
        logger.info("archive_candidate_rejected", { identifier: candidate.identifier, reasons });
        results.set(index, {
          identifier: candidate.identifier,
          status: "rejected",
          url: candidate.urlHints[0],
          errorClass: "policy_rejection",
          error: [...new Set(reasons)].join(","),
        });
        continue;
      }

      work.push({ index, candidate, hints, ...(active ? { previous: active } : {}) });
    }

    const workerCtx: WorkerContext = {
      runId,
      fetchFn: deps.fetchFn ?? defaultFetch,
      policy,
      assumptions,
      gate: deps.gate ?? new HostGate(config.hostIntervalMs),
      signal: run.signal,
      settings: config,
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      logger: logger.child("fetch"),
      metrics,
      ...(deps.random ? { random: deps.random } : {}),
      verifier,
      store,
      acceptedKinds: config.verification.acceptedKinds,
      quarantineFailed: config.quarantineFailed,
      landingPageLinks: config.landingPageLinks,
      emit: (entry) => channel.push(entry),
    };

    let attempted = 0;
    const pooled = await runWorkerPool<WorkItem, CandidateResult>(
      work,
      { concurrency: config.concurrency, signal: run.signal },
      {
        run: async (item) => {
          attempted += 1;
          const stopTimer = metrics.startTimer("candidate_ms");
          try {
            return await archiveCandidate(item, workerCtx);
          } finally {
            stopTimer();
          }
        },
        cancelled: (item) => {
          const url = item.hints[0];
          attempt(item.candidate, item.index, {
            url,
            host: hostOf(url),
            outcome: "cancelled",
            errorClass: "cancelled",
            error: "not started",
            elapsedMs: 0,
            retries: 0,
          });
          return { identifier: item.candidate.identifier, status: "cancelled", url, errorClass: "cancelled" };
        },
        failed: (item, _index, error) => {
          const url = item.hints[0];
          logger.error("archive_candidate_internal_error", { identifier: item.candidate.identifier, error: errorMessage(error) });
          attempt(item.candidate, item.index, {
            url,
            host: hostOf(url),
            outcome: "failure",
            errorClass: toErrorClass(error),
            error: errorMessage(error),
            elapsedMs: 0,
            retries: 0,
          });
          return {
            identifier: item.candidate.identifier,
            status: "failed",
            url,
            errorClass: toErrorClass(error),
            error: errorMessage(error),
          };
        },
      },
    );

    pooled.forEach((result, position) => {
      results.set(work[position].index, result);
      if (result.status === "archived" || result.status === "unchanged") {
        metrics.incrementCounter("archives_ok", 1);
      } else if (result.status === "cancelled") {
        metrics.incrementCounter("archives_cancelled", 1);
      } else {
        metrics.incrementCounter("archives_failed", 1);
      }
    });

    channel.close();
    await consumer;
    if (ledgerFailure !== undefined) {
      throw ledgerFailure;
    }

    const ordered: CandidateResult[] = [];
    candidates.forEach((_candidate, index) => {
      const result = results.get(index);
      if (result) {
        ordered.push(result);
      }
    });

    const summary = summarizeResults(ordered, attempted);
    const status: RunRecord["status"] = run.signal.aborted ? "cancelled" : "completed";
    await ledger.record({ type: "run", runId, startedAt, finishedAt: new Date().toISOString(), status, summary });

    const exportPath = path.join(config.outputDir, "ledger.csv");
    await exportLedgerCsv(ledger, exportPath);

    logger.info("archive_run_complete", { status, ...summary });
    return { runId, status, summary, results: ordered, diagnostics: loaded.diagnostics, exportPath };
  } finally {
    run.dispose();
    channel.close();
    await consumer;
  }
}
