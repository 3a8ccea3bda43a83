import { parseDelimitedRecords } from "../candidates/csv";
import { normalizeDoi, parseYear } from "../candidates/loader";
import { IndexDoc } from "./indexClient";

export interface CandidateRow {
  title: string;
  year: string;
  bibcode: string;
  doi: string;
  url_hint: string;
}

export const CANDIDATE_ROW_HEADER = ["title", "year", "bibcode", "doi", "url_hint"] as const;

export interface MasterEntry {
  title: string;
  year?: number;
  bibcode: string;
  doi: string;
}

export function toCandidateRows(docs: readonly IndexDoc[], linkGatewayUrl: string): CandidateRow[] {
  const gateway = linkGatewayUrl.replace(/\/+$/, "");
  return docs.map((doc) => ({
    title: doc.title,
    year: doc.year,
    bibcode: doc.bibcode,
    doi: doc.doi,
    url_hint: doc.bibcode ? `${gateway}/${doc.bibcode}/PUB_PDF` : "",
  }));
}

/** Keeps the first row per bibcode and per lower-cased DOI. */
export function dedupeRows(rows: readonly CandidateRow[]): CandidateRow[] {
  const seenBibcodes = new Set<string>();
  const seenDois = new Set<string>();
  const unique: CandidateRow[] = [];
  for (const row of rows) {
    const bibcode = row.bibcode.trim();
    const doi = row.doi.trim().toLowerCase();
    if ((bibcode && seenBibcodes.has(bibcode)) || (doi && seenDois.has(doi))) {
      continue;
    }
    if (bibcode) {
      seenBibcodes.add(bibcode);
    }
    if (doi) {
      seenDois.add(doi);
    }
    unique.push(row);
  }
  return unique;
}

export function normalizeTitle(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function parseMasterCatalog(text: string): MasterEntry[] {
  return parseDelimitedRecords(text, ",").map((record) => {
    const year = parseYear(record.year);
    return {
      title: record.title ?? "",
      ...(year !== undefined ? { year } : {}),
      bibcode: (record.bibcode ?? "").trim(),
      doi: normalizeDoi(record.doi) ?? "",
    };
  });
}

function titleKey(title: string, year: number | undefined): string {
  return `${title}\u0000${year ?? ""}`;
}

/**
 * Rows not already held in the master catalog. A row is held when its
 * bibcode or DOI appears there, or when its normalized title matches a
 * master title published within one year of it.
 */
export function findMissing(rows: readonly CandidateRow[], master: readonly MasterEntry[]): CandidateRow[] {
  const bibcodes = new Set(master.map((entry) => entry.bibcode).filter((bibcode) => bibcode !== ""));
  const dois = new Set(master.map((entry) => entry.doi).filter((doi) => doi !== ""));
  const titles = new Set<string>();
  for (const entry of master) {
    const title = normalizeTitle(entry.title);
    if (!title) {
      continue;
    }
    if (entry.year === undefined) {
      titles.add(titleKey(title, undefined));
      continue;
    }
    for (const offset of [-1, 0, 1]) {
      titles.add(titleKey(title, entry.year + offset));
    }
  }

  return rows.filter((row) => {
    const bibcode = row.bibcode.trim();
    const doi = normalizeDoi(row.doi) ?? "";
    const title = normalizeTitle(row.title);
    if (bibcode && bibcodes.has(bibcode)) {
      return false;
    }
    if (doi && dois.has(doi)) {
      return false;
    }
    return !(title && titles.has(titleKey(title, parseYear(row.year))));
  });
}
