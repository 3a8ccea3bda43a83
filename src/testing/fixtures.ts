import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Response } from "undici";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { FetchFn } from "../core/fetch";
import { ContentVerifierDeps } from "../verify";

export function makeTempDir(prefix = "preserver-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Bytes that start like a PDF and are padded to `size`. */
export function pdfBytes(marker = "sample", size = 2048): Buffer {
  const head = Buffer.from(`%PDF-1.4\n% ${marker}\n`, "utf-8");
  return Buffer.concat([head, Buffer.alloc(Math.max(0, size - head.length), 0x20)]);
}

export function pdfResponse(bytes: Buffer, status = 200): Response {
  return new Response(bytes, { status, headers: { "content-type": "application/pdf" } });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function redirectResponse(location: string, status = 302): Response {
  return new Response(null, { status, headers: { location } });
}

export function statusResponse(status: number): Response {
  return new Response(`status ${status}`, { status });
}

/** A request that only ends when its signal aborts, as a stalled server would. */
export const hangingFetch: FetchFn = (_url, init) =>
  new Promise((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) {
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("This operation was aborted")), { once: true });
  });

export function stubParser(text: string, total: number): NonNullable<ContentVerifierDeps["parserFactory"]> {
  return () => ({
    getText: async () => ({ text, total }),
    destroy: async () => undefined,
  });
}

/** Defaults with no waiting between retries or requests and a small text threshold. */
export function testConfig(outputDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    outputDir,
    requestTimeoutMs: 1_000,
    maxRetries: 2,
    backoff: { baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 },
    hostIntervalMs: 0,
    verification: { ...DEFAULT_CONFIG.verification, minTextChars: 10 },
    ...overrides,
  };
}
