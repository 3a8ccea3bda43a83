import crypto from "node:crypto";
import { PDFParse } from "pdf-parse";
import { VerificationConfig } from "../config";
import { VerificationError, errorMessage } from "../core/errors";
import { Logger, createSilentLogger } from "../observability";
import { ContentKind, TextStats } from "../types";
import { computeTextStats, containsAnyTerm } from "./textStats";

export interface RawPayload {
  bytes: Buffer;
  contentType?: string;
  url: string;
}

export interface ExpectedContent {
  kinds: readonly ContentKind[];
  /** Whether a PDF without extractable text may be archived. */
  acceptScanOnly: boolean;
}

export interface VerifiedContent {
  kind: ContentKind;
  checksum: string;
  bytes: number;
  contentType?: string;
  pageCount: number | null;
  textStats: TextStats | "unknown";
  scanOnly: boolean;
}

export type DetectedKind = ContentKind | "html" | "unknown";

interface ParserLike {
  getText(): Promise<{ text: string; total: number }>;
  destroy(): Promise<void>;
}

export interface ContentVerifierDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  logger?: Logger;
}

export function sha256Hex(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

function startsWith(bytes: Buffer, signature: readonly number[]): boolean {
  return bytes.length >= signature.length && signature.every((value, index) => bytes[index] === value);
}

function baseContentType(contentType: string | undefined): string {
  return (contentType ?? "").split(";")[0].trim().toLowerCase();
}

/** Magic bytes first; the declared content type only breaks ties. */
export function detectKind(bytes: Buffer, contentType?: string): DetectedKind {
  if (bytes.subarray(0, 1024).includes("%PDF-")) {
    return "pdf";
  }
  if (startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a])) {
    return "tiff";
  }
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) {
    return "jpeg";
  }
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return "png";
  }

  const type = baseContentType(contentType);
  const head = bytes.subarray(0, 512).toString("utf-8").trimStart().toLowerCase();
  if (type === "text/html" || type === "application/xhtml+xml" || head.startsWith("<!doctype html") || head.startsWith("<html")) {
    return "html";
  }
  return "unknown";
}

export class ContentVerifier {
  private readonly config: VerificationConfig;
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly logger: Logger;

  constructor(config: VerificationConfig, deps: ContentVerifierDeps = {}) {
    this.config = config;
    this.parserFactory = deps.parserFactory ?? ((data) => new PDFParse({ data: new Uint8Array(data) }));
    this.logger = deps.logger ?? createSilentLogger("verify");
  }

  /**
   * The checksum is computed first; failures carry it too.
   * Statistics extraction errors leave `pageCount` null and `textStats`
   * "unknown" rather than failing the payload.
   */
  async verify(payload: RawPayload, expected: ExpectedContent): Promise<VerifiedContent | VerificationError> {
    const checksum = sha256Hex(payload.bytes);
    const size = payload.bytes.length;
    const fail = (reason: string): VerificationError => new VerificationError(reason, checksum, size);

    if (size === 0) {
      return fail("empty_payload");
    }

    const detected = detectKind(payload.bytes, payload.contentType);
    if (detected === "html") {
      return fail("html_page");
    }
    if (detected === "unknown") {
      return fail(`unsupported_content:${baseContentType(payload.contentType) || "none"}`);
    }
    if (!expected.kinds.includes(detected)) {
      return fail(`kind_not_accepted:${detected}`);
    }
    if (size < this.config.minBytes) {
      return fail(`too_small:${size}`);
    }

    let pageCount: number | null = null;
    let textStats: TextStats | "unknown" = "unknown";
    let text = "";

    if (detected === "pdf") {
      const extracted = await this.extractPdfText(payload);
      if (extracted) {
        pageCount = extracted.total;
        text = extracted.text;
        textStats = computeTextStats(text, this.config.minTextChars, this.config.keywords);
      }
    }

    if (pageCount !== null && (pageCount < this.config.minPages || pageCount > this.config.maxPages)) {
      return fail(`page_count_out_of_range:${pageCount}`);
    }

    const scanOnly = textStats !== "unknown" && !textStats.hasText;
    if (scanOnly && !expected.acceptScanOnly) {
      return fail("scan_only_not_accepted");
    }
    if (textStats !== "unknown" && textStats.hasText && this.config.requiredTerms.length > 0) {
      if (!containsAnyTerm(text, this.config.requiredTerms)) {
        return fail("required_terms_missing");
      }
    }

    return {
      kind: detected,
      checksum,
      bytes: size,
      ...(payload.contentType ? { contentType: payload.contentType } : {}),
      pageCount,
      textStats,
      scanOnly,
    };
  }

  private async extractPdfText(payload: RawPayload): Promise<{ text: string; total: number } | undefined> {
    let parser: ParserLike | undefined;
    try {
      parser = this.parserFactory(payload.bytes);
      const parsed = await parser.getText();
      return { text: parsed.text ?? "", total: parsed.total };
    } catch (error) {
      this.logger.warn("verify_pdf_stats_unavailable", { url: payload.url, error: errorMessage(error) });
      return undefined;
    } finally {
      await parser?.destroy().catch(() => undefined);
    }
  }
}
