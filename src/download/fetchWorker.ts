import { VerificationError, errorMessage } from "../core/errors";
import { ArchiveStore } from "../storage";
import { ArchivedRecord, Candidate, ContentKind, ErrorClass, FetchAttempt, LedgerEntry } from "../types";
import { ContentVerifier, detectKind } from "../verify";
import { FetchContext, FetchedPayload, fetchWithRetries } from "./attemptMachine";
import { extractPdfLinksFromHtml } from "./landingPageParser";

export interface WorkItem {
  /** Position of the candidate in the run's input order. */
  index: number;
  candidate: Candidate;
  /** Hints that passed the trust policy, in order. */
  hints: string[];
  /** Active record being replaced on a forced re-run. */
  previous?: ArchivedRecord;
}

export type CandidateStatus = "archived" | "unchanged" | "failed" | "cancelled" | "skipped" | "rejected";

export interface CandidateResult {
  identifier: string;
  status: CandidateStatus;
  url?: string;
  checksum?: string;
  storagePath?: string;
  errorClass?: ErrorClass;
  error?: string;
}

export interface WorkerContext extends FetchContext {
  runId: string;
  verifier: ContentVerifier;
  store: ArchiveStore;
  acceptedKinds: readonly ContentKind[];
  quarantineFailed: boolean;
  landingPageLinks: number;
  /** Hands a finished ledger entry to the run's single ledger writer. */
  emit: (entry: LedgerEntry) => void;
}

type AttemptFields = Omit<FetchAttempt, "type" | "runId" | "identifier" | "timestamp">;

function attemptEntry(ctx: WorkerContext, item: WorkItem, fields: AttemptFields): FetchAttempt {
  return {
    type: "attempt",
    runId: ctx.runId,
    identifier: item.candidate.identifier,
    position: item.index,
    timestamp: new Date().toISOString(),
    ...fields,
  };
}

function landingPageHints(ctx: WorkerContext, payload: FetchedPayload, known: readonly string[], budget: number): string[] {
  if (budget <= 0) {
    return [];
  }
  return extractPdfLinksFromHtml(payload.bytes.toString("utf-8"), payload.url)
    .map((link) => link.url)
    .filter((url) => !known.includes(url) && ctx.policy.isTrusted(url, ctx.assumptions).allowed)
    .slice(0, budget);
}

/**
 * Tries the candidate's hints in order until one yields verified content.
 * Emits one attempt entry per URL tried, plus an ArchivedRecord on success,
 * and always returns exactly one terminal result.
 */
export async function archiveCandidate(item: WorkItem, ctx: WorkerContext): Promise<CandidateResult> {
  const { candidate } = item;
  const logger = ctx.logger;
  const hints = [...item.hints];
  let landingBudget = ctx.landingPageLinks;
  let lastFailure: Pick<CandidateResult, "url" | "errorClass" | "error"> = {};

  for (let position = 0; position < hints.length; position += 1) {
    const url = hints[position];
    const fetched = await fetchWithRetries(url, ctx);

    if (fetched.state === "cancelled") {
      ctx.emit(
        attemptEntry(ctx, item, {
          url: fetched.url,
          host: fetched.host,
          outcome: "cancelled",
          errorClass: "cancelled",
          error: fetched.error,
          elapsedMs: fetched.elapsedMs,
          retries: fetched.retries,
        }),
      );
      return { identifier: candidate.identifier, status: "cancelled", url: fetched.url, errorClass: "cancelled" };
    }

    if (fetched.state === "terminal_failure") {
      logger.warn("archive_url_failed", {
        identifier: candidate.identifier,
        url: fetched.url,
        errorClass: fetched.errorClass,
        error: fetched.error,
        retries: fetched.retries,
      });
      ctx.emit(
        attemptEntry(ctx, item, {
          url: fetched.url,
          host: fetched.host,
          outcome: "failure",
          ...(fetched.statusCode !== undefined ? { statusCode: fetched.statusCode } : {}),
          errorClass: fetched.errorClass,
          error: fetched.error,
          elapsedMs: fetched.elapsedMs,
          retries: fetched.retries,
        }),
      );
      lastFailure = { url: fetched.url, errorClass: fetched.errorClass, error: fetched.error };
      continue;
    }

    const { payload } = fetched;
    const base = {
      url: payload.url,
      host: payload.host,
      statusCode: payload.statusCode,
      retries: fetched.retries,
    };

    try {
      const stopVerify = ctx.metrics.startTimer("verify_ms");
      const verified = await ctx.verifier.verify(
        { bytes: payload.bytes, url: payload.url, ...(payload.contentType ? { contentType: payload.contentType } : {}) },
        { kinds: ctx.acceptedKinds, acceptScanOnly: ctx.assumptions.acceptScanOnly },
      );
      stopVerify();

      if (verified instanceof VerificationError) {
        ctx.metrics.incrementCounter("verification_failed", 1);
        let quarantinePath: string | undefined;
        if (verified.reason === "html_page") {
          const extra = landingPageHints(ctx, payload, hints, landingBudget);
          landingBudget -= extra.length;
          hints.push(...extra);
          if (extra.length > 0) {
            logger.info("archive_landing_page_links", { identifier: candidate.identifier, url: payload.url, links: extra });
          }
        } else if (ctx.quarantineFailed) {
          const detected = detectKind(payload.bytes, payload.contentType);
          const kind = detected === "html" || detected === "unknown" ? undefined : detected;
          quarantinePath = await ctx.store.quarantine(candidate.identifier, verified.checksum, payload.bytes, kind);
        }

        logger.warn("archive_verification_failed", {
          identifier: candidate.identifier,
          url: payload.url,
          reason: verified.reason,
          checksum: verified.checksum,
        });
        ctx.emit(
          attemptEntry(ctx, item, {
            ...base,
            outcome: "failure",
            errorClass: "verification",
            error: verified.reason,
            elapsedMs: fetched.elapsedMs,
            checksum: verified.checksum,
            bytes: verified.bytes,
            ...(quarantinePath ? { quarantinePath } : {}),
          }),
        );
        lastFailure = { url: payload.url, errorClass: "verification", error: verified.reason };
        continue;
      }

      const success = attemptEntry(ctx, item, {
        ...base,
        outcome: "success",
        elapsedMs: fetched.elapsedMs,
        checksum: verified.checksum,
        bytes: verified.bytes,
        ...(verified.pageCount !== null ? { pageCount: verified.pageCount } : {}),
      });

      if (item.previous && item.previous.checksum === verified.checksum) {
        ctx.emit(success);
        logger.info("archive_candidate_unchanged", { identifier: candidate.identifier, checksum: verified.checksum });
        return {
          identifier: candidate.identifier,
          status: "unchanged",
          url: payload.url,
          checksum: verified.checksum,
          storagePath: item.previous.storagePath,
        };
      }

      const stored = await ctx.store.store(payload.bytes, verified.checksum, verified.kind);
      ctx.emit(success);
      ctx.emit({
        type: "archived",
        runId: ctx.runId,
        identifier: candidate.identifier,
        url: payload.url,
        sourceUrl: payload.sourceUrl,
        host: payload.host,
        storagePath: stored.storagePath,
        checksum: verified.checksum,
        bytes: verified.bytes,
        ...(verified.contentType ? { contentType: verified.contentType } : {}),
        kind: verified.kind,
        pageCount: verified.pageCount,
        textStats: verified.textStats,
        scanOnly: verified.scanOnly,
        position: item.index,
        timestamp: new Date().toISOString(),
        ...(item.previous ? { supersedes: item.previous.checksum } : {}),
      });
      logger.info("archive_candidate_ok", {
        identifier: candidate.identifier,
        url: payload.url,
        checksum: verified.checksum,
        storagePath: stored.storagePath,
        deduplicated: stored.deduplicated,
      });
      return {
        identifier: candidate.identifier,
        status: "archived",
        url: payload.url,
        checksum: verified.checksum,
        storagePath: stored.storagePath,
      };
    } catch (error) {
      logger.error("archive_url_internal_error", { identifier: candidate.identifier, url: payload.url, error: errorMessage(error) });
      ctx.emit(
        attemptEntry(ctx, item, {
          ...base,
          outcome: "failure",
          errorClass: "internal",
          error: errorMessage(error),
          elapsedMs: fetched.elapsedMs,
        }),
      );
      lastFailure = { url: payload.url, errorClass: "internal", error: errorMessage(error) };
    }
  }

  return { identifier: candidate.identifier, status: "failed", ...lastFailure };
}
