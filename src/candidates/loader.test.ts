import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../core/errors";
import { makeTempDir, removeDir } from "../testing/fixtures";
import { formatDelimited, parseDelimited } from "./csv";
import { detectFormat, loadCandidates, normalizeDoi, parseCandidates, parseYear } from "./loader";

describe("parseDelimited", () => {
  it("handles quotes, doubled quotes, embedded newlines and CRLF", () => {
    const text = '\uFEFFa,b\r\n"x, y","say ""hi"""\r\n"multi\nline",z\r\n\r\n';
    expect(parseDelimited(text)).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
      ["multi\nline", "z"],
    ]);
  });

  it("formats fields that need quoting", () => {
    expect(formatDelimited(["a", "b"], [["x,y", 'q"'], [1, undefined]])).toBe('a,b\n"x,y","q"""\n1,\n');
  });
});

describe("parseCandidates", () => {
  it("keeps valid rows in source order with their hints", () => {
    const text = [
      "identifier,title,year,url_hints",
      "A,First paper,1905,https://a.example.org/1.pdf|https://b.example.org/1.pdf",
      "B,  Second   paper ,1915-11,https://a.example.org/2.pdf",
    ].join("\n");

    const result = parseCandidates(text, "csv");

    expect(result.diagnostics).toEqual([]);
    expect(result.candidates).toEqual([
      {
        identifier: "A",
        title: "First paper",
        year: 1905,
        urlHints: ["https://a.example.org/1.pdf", "https://b.example.org/1.pdf"],
      },
      { identifier: "B", title: "Second paper", year: 1915, urlHints: ["https://a.example.org/2.pdf"] },
    ]);
  });

  it("drops invalid rows with a diagnostic and keeps the first of duplicate identifiers", () => {
    const text = [
      "identifier,title,year,url",
      ",No id,1905,https://a.example.org/x.pdf",
      "C,,1905,https://a.example.org/x.pdf",
      "D,Bad year,n/a,https://a.example.org/x.pdf",
      "E,No hints,1905,",
      "F,Kept,1920,https://a.example.org/f1.pdf",
      "F,Duplicate,1921,https://a.example.org/f2.pdf",
    ].join("\n");

    const result = parseCandidates(text, "csv");

    expect(result.candidates.map((candidate) => candidate.identifier)).toEqual(["F"]);
    expect(result.candidates[0].urlHints).toEqual(["https://a.example.org/f1.pdf"]);
    expect(result.diagnostics).toEqual([
      { record: 1, reason: "missing_identifier" },
      { record: 2, identifier: "C", reason: "missing_title" },
      { record: 3, identifier: "D", reason: "invalid_year" },
      { record: 4, identifier: "E", reason: "no_url_hints" },
      { record: 6, identifier: "F", reason: "duplicate_identifier" },
    ]);
  });

  it("keeps a valid row whose identifier was first seen on an invalid row", () => {
    const text = [
      "identifier,title,year,url",
      "G,,1905,https://a.example.org/g1.pdf",
      "G,Corrected,1905,https://a.example.org/g2.pdf",
      "G,Later copy,1906,https://a.example.org/g3.pdf",
    ].join("\n");

    const result = parseCandidates(text, "csv");

    expect(result.candidates).toEqual([
      { identifier: "G", title: "Corrected", year: 1905, urlHints: ["https://a.example.org/g2.pdf"] },
    ]);
    expect(result.diagnostics).toEqual([
      { record: 1, identifier: "G", reason: "missing_title" },
      { record: 3, identifier: "G", reason: "duplicate_identifier" },
    ]);
  });

  it("uses the bibcode as identifier and derives doi and gateway hints after explicit ones", () => {
    const text = "bibcode\ttitle\tyear\tdoi\turl_hint\n1905AnP...322..891E\tOn the electrodynamics\t1905\tdoi:10.1002/ANDP.19053221004\thttps://a.example.org/e.pdf\n";

    const result = parseCandidates(text, "tsv", {
      deriveHints: true,
      linkGatewayUrl: "https://gateway.example.org/link_gateway/",
    });

    expect(result.candidates).toEqual([
      {
        identifier: "1905AnP...322..891E",
        title: "On the electrodynamics",
        year: 1905,
        doi: "10.1002/andp.19053221004",
        bibcode: "1905AnP...322..891E",
        urlHints: [
          "https://a.example.org/e.pdf",
          "https://doi.org/10.1002/andp.19053221004",
          "https://gateway.example.org/link_gateway/1905AnP...322..891E/PUB_PDF",
        ],
      },
    ]);
  });

  it("reads JSON lines and reports unparseable lines", () => {
    const text = [
      JSON.stringify({ identifier: "J1", title: "Json", year: 1930, url_hints: ["https://a.example.org/j.pdf"] }),
      "{not json",
    ].join("\n");

    const result = parseCandidates(text, "jsonl");

    expect(result.candidates).toEqual([
      { identifier: "J1", title: "Json", year: 1930, urlHints: ["https://a.example.org/j.pdf"] },
    ]);
    expect(result.diagnostics).toEqual([{ record: 2, reason: "invalid_json" }]);
  });
});

describe("field helpers", () => {
  it("parses the leading four-digit year", () => {
    expect(parseYear("1916-03")).toBe(1916);
    expect(parseYear("191")).toBeUndefined();
  });

  it("normalizes DOIs from URLs and prefixes", () => {
    expect(normalizeDoi("https://doi.org/10.1000/ABC")).toBe("10.1000/abc");
    expect(normalizeDoi("nan")).toBeUndefined();
  });

  it("detects the format from the extension", () => {
    expect(detectFormat("list.tsv")).toBe("tsv");
    expect(detectFormat("list.ndjson")).toBe("jsonl");
    expect(detectFormat("list.txt")).toBe("csv");
  });
});

describe("loadCandidates", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("loads a file and gives the same result on every read", async () => {
    const source = path.join(dir, "candidates.csv");
    fs.writeFileSync(source, "identifier,title,year,url\nA,Paper,1905,https://a.example.org/a.pdf\n");

    const first = await loadCandidates(source);
    const second = await loadCandidates(source);

    expect(first.candidates).toHaveLength(1);
    expect(second).toEqual(first);
  });

  it("reports a missing source as a configuration error", async () => {
    await expect(loadCandidates(path.join(dir, "missing.csv"))).rejects.toBeInstanceOf(ConfigurationError);
  });
});
