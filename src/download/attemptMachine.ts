import type { Dispatcher } from "undici";
import { AppConfig } from "../config";
import {
  ArchiveError,
  CancelledError,
  HttpClientError,
  NetworkError,
  PolicyRejectionError,
  TransientNetworkError,
  cancellationOf,
  errorMessage,
  toErrorClass,
} from "../core/errors";
import {
  FetchFn,
  isFetchFailure,
  isRedirectStatus,
  isTransientNetworkFailure,
  isTransientStatus,
  networkErrorCode,
} from "../core/fetch";
import { sleep } from "../core/sleep";
import { Logger, MetricsRegistry } from "../observability";
import { RunAssumptions, TrustPolicy, hostOf } from "../policy";
import { ErrorClass } from "../types";
import { computeBackoffDelay } from "./backoff";
import { HostGate } from "./hostGate";

export type AttemptState =
  | "pending"
  | "in_flight"
  | "transient_failure"
  | "backoff_wait"
  | "succeeded"
  | "terminal_failure"
  | "cancelled";

const TRANSITIONS: Record<AttemptState, readonly AttemptState[]> = {
  pending: ["in_flight", "cancelled"],
  in_flight: ["succeeded", "transient_failure", "terminal_failure", "cancelled"],
  transient_failure: ["backoff_wait", "terminal_failure", "cancelled"],
  backoff_wait: ["in_flight", "cancelled"],
  succeeded: [],
  terminal_failure: [],
  cancelled: [],
};

/** Lifecycle of one URL within one candidate. Terminal states accept no transition. */
export class UrlAttempt {
  readonly url: string;
  retries = 0;
  private current: AttemptState = "pending";
  private readonly trail: AttemptState[] = ["pending"];

  constructor(url: string) {
    this.url = url;
  }

  get state(): AttemptState {
    return this.current;
  }

  get history(): readonly AttemptState[] {
    return this.trail;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: AttemptState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid attempt transition ${this.current} -> ${next} for ${this.url}`);
    }
    this.current = next;
    this.trail.push(next);
  }
}

export type FetchSettings = Pick<
  AppConfig,
  "userAgent" | "requestTimeoutMs" | "maxRetries" | "backoff" | "maxRedirects" | "maxDownloadBytes"
>;

export interface FetchContext {
  fetchFn: FetchFn;
  policy: TrustPolicy;
  assumptions: RunAssumptions;
  gate: HostGate;
  signal: AbortSignal;
  settings: FetchSettings;
  dispatcher?: Dispatcher;
  logger: Logger;
  metrics: MetricsRegistry;
  random?: () => number;
}

export interface FetchedPayload {
  /** Final URL after redirects. */
  url: string;
  sourceUrl: string;
  host: string;
  statusCode: number;
  contentType?: string;
  bytes: Buffer;
}

export type UrlFetchResult =
  | {
      state: "succeeded";
      payload: FetchedPayload;
      retries: number;
      elapsedMs: number;
      history: readonly AttemptState[];
    }
  | UrlFetchFailure<"terminal_failure">
  | UrlFetchFailure<"cancelled">;

interface UrlFetchFailure<S extends "terminal_failure" | "cancelled"> {
  state: S;
  url: string;
  host: string;
  retries: number;
  elapsedMs: number;
  errorClass: ErrorClass;
  error: string;
  statusCode?: number;
  history: readonly AttemptState[];
}

type HopResponse =
  | { kind: "redirect"; statusCode: number; location?: string }
  | { kind: "body"; statusCode: number; url: string; contentType?: string; bytes: Buffer };

function toBuffer(chunk: unknown): Buffer {
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  return Buffer.from(String(chunk));
}

async function sendRequest(url: string, ctx: FetchContext): Promise<HopResponse> {
  const { settings } = ctx;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, settings.requestTimeoutMs);
  const onRunAbort = (): void => controller.abort();
  ctx.signal.addEventListener("abort", onRunAbort, { once: true });

  const stopTimer = ctx.metrics.startTimer("request_ms");
  ctx.metrics.incrementCounter("requests_sent", 1);
  try {
    const response = await ctx.fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": settings.userAgent,
        accept: "application/pdf,image/tiff,image/jpeg,image/png;q=0.9,text/html;q=0.5,*/*;q=0.1",
      },
      redirect: "manual",
      signal: controller.signal,
      ...(ctx.dispatcher ? { dispatcher: ctx.dispatcher } : {}),
    });

    if (isRedirectStatus(response.status)) {
      await response.body?.cancel();
      return { kind: "redirect", statusCode: response.status, location: response.headers.get("location") ?? undefined };
    }
    if (!response.ok) {
      await response.body?.cancel();
      if (isTransientStatus(response.status)) {
        throw new TransientNetworkError(`HTTP ${response.status}`, response.status);
      }
      throw new HttpClientError(response.status);
    }

    const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
    if (Number.isFinite(declaredLength) && declaredLength > settings.maxDownloadBytes) {
      await response.body?.cancel();
      throw new HttpClientError(response.status, `payload of ${declaredLength} bytes exceeds ${settings.maxDownloadBytes}`);
    }

    const chunks: Buffer[] = [];
    let total = 0;
    if (response.body) {
      for await (const chunk of response.body) {
        const buffer = toBuffer(chunk);
        total += buffer.length;
        if (total > settings.maxDownloadBytes) {
          throw new HttpClientError(response.status, `payload exceeds ${settings.maxDownloadBytes} bytes`);
        }
        chunks.push(buffer);
      }
    }

    return {
      kind: "body",
      statusCode: response.status,
      url: response.url || url,
      contentType: response.headers.get("content-type") ?? undefined,
      bytes: Buffer.concat(chunks),
    };
  } catch (error) {
    if (error instanceof ArchiveError) {
      throw error;
    }
    if (ctx.signal.aborted) {
      throw cancellationOf(ctx.signal);
    }
    if (timedOut) {
      throw new TransientNetworkError(`timeout after ${settings.requestTimeoutMs}ms`);
    }
    if (isTransientNetworkFailure(error)) {
      throw new TransientNetworkError(errorMessage(error));
    }
    if (isFetchFailure(error)) {
      const code = networkErrorCode(error);
      throw new NetworkError(code ? `fetch failed: ${code}` : "fetch failed", code);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
    ctx.signal.removeEventListener("abort", onRunAbort);
    stopTimer();
  }
}

/**
 * One request with its redirect chain. Every hop is checked against the trust
 * policy before its host is contacted and takes that host's slot separately.
 */
async function requestOnce(sourceUrl: string, ctx: FetchContext, trace: { url: string }): Promise<FetchedPayload> {
  let current = sourceUrl;
  for (let hop = 0; ; hop += 1) {
    trace.url = current;
    const decision = ctx.policy.isTrusted(current, ctx.assumptions);
    if (!decision.allowed) {
      throw new PolicyRejectionError(decision.reason, current);
    }

    const requestUrl = current;
    const response = await ctx.gate.withHost(decision.host, ctx.signal, () => sendRequest(requestUrl, ctx));
    if (response.kind === "body") {
      return {
        url: response.url,
        sourceUrl,
        host: hostOf(response.url) || decision.host,
        statusCode: response.statusCode,
        ...(response.contentType ? { contentType: response.contentType } : {}),
        bytes: response.bytes,
      };
    }

    if (!response.location) {
      throw new HttpClientError(response.statusCode, `HTTP ${response.statusCode} without location`);
    }
    if (hop >= ctx.settings.maxRedirects) {
      throw new HttpClientError(response.statusCode, `more than ${ctx.settings.maxRedirects} redirects`);
    }
    try {
      current = new URL(response.location, current).toString();
    } catch {
      throw new PolicyRejectionError("unparseable-url", response.location);
    }
    ctx.logger.debug("fetch_redirect", { url: requestUrl, location: current, statusCode: response.statusCode });
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof HttpClientError || error instanceof TransientNetworkError) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Drives one URL through the attempt states: transient failures are retried
 * with backoff up to `maxRetries` times, anything else ends the URL.
 */
export async function fetchWithRetries(url: string, ctx: FetchContext): Promise<UrlFetchResult> {
  const attempt = new UrlAttempt(url);
  const startedAt = Date.now();
  const trace = { url };

  const finish = (state: "terminal_failure" | "cancelled", error: unknown): UrlFetchResult => {
    attempt.transition(state);
    const statusCode = statusCodeOf(error);
    return {
      state,
      url: trace.url,
      host: hostOf(trace.url),
      retries: attempt.retries,
      elapsedMs: Date.now() - startedAt,
      errorClass: state === "cancelled" ? "cancelled" : toErrorClass(error),
      error: errorMessage(error),
      ...(statusCode !== undefined ? { statusCode } : {}),
      history: attempt.history,
    };
  };

  for (;;) {
    if (ctx.signal.aborted) {
      return finish("cancelled", cancellationOf(ctx.signal));
    }
    attempt.transition("in_flight");

    try {
      const payload = await requestOnce(url, ctx, trace);
      attempt.transition("succeeded");
      return {
        state: "succeeded",
        payload,
        retries: attempt.retries,
        elapsedMs: Date.now() - startedAt,
        history: attempt.history,
      };
    } catch (error) {
      if (error instanceof CancelledError || ctx.signal.aborted) {
        return finish("cancelled", error instanceof CancelledError ? error : cancellationOf(ctx.signal));
      }
      if (!(error instanceof TransientNetworkError)) {
        return finish("terminal_failure", error);
      }

      attempt.transition("transient_failure");
      if (attempt.retries >= ctx.settings.maxRetries) {
        return finish("terminal_failure", error);
      }

      const delayMs = computeBackoffDelay(attempt.retries, ctx.settings.backoff, ctx.random);
      attempt.retries += 1;
      ctx.metrics.incrementCounter("request_retries", 1);
      ctx.logger.warn("fetch_retry_scheduled", {
        url: trace.url,
        retry: attempt.retries,
        delayMs,
        statusCode: error.statusCode,
        error: error.message,
      });

      attempt.transition("backoff_wait");
      try {
        await sleep(delayMs, ctx.signal);
      } catch (sleepError) {
        return finish("cancelled", sleepError);
      }
    }
  }
}
