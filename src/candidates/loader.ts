import fs from "node:fs";
import path from "node:path";
import { ConfigurationError, errorMessage } from "../core/errors";
import { Candidate } from "../types";
import { parseDelimitedRecords } from "./csv";

export type SourceFormat = "csv" | "tsv" | "jsonl";

export type DropReason =
  | "invalid_json"
  | "missing_identifier"
  | "missing_title"
  | "invalid_year"
  | "no_url_hints"
  | "duplicate_identifier";

export interface LoadDiagnostic {
  /** 1-based position of the record in the source, header excluded. */
  record: number;
  identifier?: string;
  reason: DropReason;
}

export interface LoadResult {
  candidates: Candidate[];
  diagnostics: LoadDiagnostic[];
}

export interface LoadOptions {
  format?: SourceFormat;
  /** Append doi.org and link-gateway URLs after the explicit hints. */
  deriveHints?: boolean;
  linkGatewayUrl?: string;
}

type RawRecord = Record<string, string>;

export function detectFormat(sourcePath: string): SourceFormat {
  const ext = path.extname(sourcePath).toLowerCase();
  if (ext === ".jsonl" || ext === ".ndjson") {
    return "jsonl";
  }
  if (ext === ".tsv" || ext === ".tab") {
    return "tsv";
  }
  return "csv";
}

function flattenJsonValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value
      .filter((item) => typeof item === "string" || typeof item === "number")
      .map(String)
      .join("|");
  }
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  return "";
}

function parseJsonLines(text: string): Array<RawRecord | undefined> {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "")
    .map((line) => {
      try {
        const parsed: unknown = JSON.parse(line);
        if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
          return undefined;
        }
        const record: RawRecord = {};
        for (const [key, value] of Object.entries(parsed)) {
          record[key.trim().toLowerCase()] = flattenJsonValue(value);
        }
        return record;
      } catch {
        return undefined;
      }
    });
}

export function parseYear(value: string | undefined): number | undefined {
  const match = /^\s*(\d{4})/.exec(value ?? "");
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function normalizeDoi(value: string | undefined): string | undefined {
  const doi = (value ?? "")
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, "")
    .replace(/^doi:\s*/i, "")
    .toLowerCase();
  return doi === "" || doi === "nan" ? undefined : doi;
}

function field(record: RawRecord, ...keys: string[]): string {
  for (const key of keys) {
    const value = record[key]?.trim();
    if (value && value.toLowerCase() !== "nan") {
      return value;
    }
  }
  return "";
}

function collectHints(record: RawRecord, doi: string | undefined, bibcode: string, options: LoadOptions): string[] {
  const explicit = [
    ...field(record, "url_hints").split(/[|\s]+/),
    field(record, "url_hint"),
    field(record, "url"),
  ];
  const derived: string[] = [];
  if (options.deriveHints) {
    if (doi) {
      derived.push(`https://doi.org/${encodeURI(doi)}`);
    }
    if (bibcode && options.linkGatewayUrl) {
      derived.push(`${options.linkGatewayUrl.replace(/\/+$/, "")}/${encodeURIComponent(bibcode)}/PUB_PDF`);
    }
  }

  const seen = new Set<string>();
  const hints: string[] = [];
  for (const hint of [...explicit, ...derived]) {
    const trimmed = hint.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      hints.push(trimmed);
    }
  }
  return hints;
}

/**
 * Normalizes raw records into candidates in source order. Invalid rows are
 * dropped with a diagnostic and claim nothing: a repeated identifier keeps
 * its first valid row, so a corrected row may follow a broken one.
 */
export function normalizeRecords(records: Array<RawRecord | undefined>, options: LoadOptions = {}): LoadResult {
  const candidates: Candidate[] = [];
  const diagnostics: LoadDiagnostic[] = [];
  const seen = new Set<string>();

  records.forEach((record, index) => {
    const position = index + 1;
    if (!record) {
      diagnostics.push({ record: position, reason: "invalid_json" });
      return;
    }

    const bibcode = field(record, "bibcode");
    const identifier = field(record, "identifier", "id") || bibcode;
    if (!identifier) {
      diagnostics.push({ record: position, reason: "missing_identifier" });
      return;
    }
    if (seen.has(identifier)) {
      diagnostics.push({ record: position, identifier, reason: "duplicate_identifier" });
      return;
    }

    const title = field(record, "title").replace(/\s+/g, " ");
    if (!title) {
      diagnostics.push({ record: position, identifier, reason: "missing_title" });
      return;
    }
    const year = parseYear(field(record, "year"));
    if (year === undefined) {
      diagnostics.push({ record: position, identifier, reason: "invalid_year" });
      return;
    }

    const doi = normalizeDoi(field(record, "doi"));
    const urlHints = collectHints(record, doi, bibcode, options);
    if (urlHints.length === 0) {
      diagnostics.push({ record: position, identifier, reason: "no_url_hints" });
      return;
    }

    seen.add(identifier);
    candidates.push({
      identifier,
      title,
      year,
      ...(doi ? { doi } : {}),
      ...(bibcode ? { bibcode } : {}),
      urlHints,
    });
  });

  return { candidates, diagnostics };
}

export function parseCandidates(text: string, format: SourceFormat, options: LoadOptions = {}): LoadResult {
  const records = format === "jsonl" ? parseJsonLines(text) : parseDelimitedRecords(text, format === "tsv" ? "\t" : ",");
  return normalizeRecords(records, options);
}

/** Reads the whole source; an unreadable file is a ConfigurationError. */
export async function loadCandidates(sourcePath: string, options: LoadOptions = {}): Promise<LoadResult> {
  let text: string;
  try {
    text = await fs.promises.readFile(path.resolve(sourcePath), "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read candidate source ${sourcePath}: ${errorMessage(error)}`);
  }
  return parseCandidates(text, options.format ?? detectFormat(sourcePath), options);
}
