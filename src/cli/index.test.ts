import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { ConfigurationError } from "../core/errors";
import { FetchFn } from "../core/fetch";
import { makeTempDir, removeDir } from "../testing/fixtures";
import { applyCliOverrides, getHelpText, parseCliArgs, runCli } from "./index";

describe("parseCliArgs", () => {
  it("returns help for -h, --help and unknown commands", () => {
    expect(parseCliArgs(["archive", "--help"])).toBe("help");
    expect(parseCliArgs(["-h"])).toBe("help");
    expect(parseCliArgs(["frobnicate"])).toBe("help");
    expect(parseCliArgs([])).toBe("help");
  });

  it("parses switches, repeatable hosts and numeric options", () => {
    expect(
      parseCliArgs([
        "archive",
        "--source",
        "list.csv",
        "--force",
        "--trust-host",
        "a.example.org",
        "--trust-host",
        "b.example.org",
        "--concurrency",
        "2",
        "--concurrency",
        "4",
        "--ledger",
        "sqlite",
        "--accept-scan-only",
      ]),
    ).toEqual({
      command: "archive",
      sourcePath: "list.csv",
      force: true,
      allowLicensed: false,
      acceptScanOnly: true,
      insecure: false,
      trustHosts: ["a.example.org", "b.example.org"],
      concurrency: 4,
      ledgerBackend: "sqlite",
    });
  });

  it("rejects unknown options, missing values and malformed numbers", () => {
    expect(() => parseCliArgs(["archive", "--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseCliArgs(["archive", "--source"])).toThrow("--source requires a value");
    expect(() => parseCliArgs(["archive", "--retries", "-1"])).toThrow('--retries expects a non-negative integer, got "-1"');
    expect(() => parseCliArgs(["status", "--ledger", "csv"])).toThrow(ConfigurationError);
  });
});

describe("applyCliOverrides", () => {
  it("widens accepted assumptions and appends trusted hosts", () => {
    const base = { ...DEFAULT_CONFIG, accepted: { allowLicensed: true, acceptScanOnly: false }, extraTrustedHosts: ["x.example.org"] };
    const parsed = parseCliArgs(["status", "--trust-host", "y.example.org", "--retries", "0", "--out", "elsewhere"]);
    if (parsed === "help") {
      throw new Error("expected parsed arguments");
    }

    const config = applyCliOverrides(base, parsed);

    expect(config.accepted).toEqual({ allowLicensed: true, acceptScanOnly: false });
    expect(config.extraTrustedHosts).toEqual(["x.example.org", "y.example.org"]);
    expect(config.maxRetries).toBe(0);
    expect(config.outputDir).toBe("elsewhere");
  });

  it("validates the combined settings", () => {
    const parsed = parseCliArgs(["status", "--concurrency", "0"]);
    if (parsed === "help") {
      throw new Error("expected parsed arguments");
    }
    expect(() => applyCliOverrides(DEFAULT_CONFIG, parsed)).toThrow("concurrency must be an integer >= 1");
  });
});

describe("runCli", () => {
  let dir: string;
  let lines: string[];
  const output = (line: string): void => {
    lines.push(line);
  };
  const messages = (): unknown[] =>
    lines.flatMap((line) => {
      const parsed: unknown = JSON.parse(line);
      return parsed && typeof parsed === "object" ? [Reflect.get(parsed, "msg")] : [];
    });

  beforeEach(() => {
    dir = makeTempDir();
    lines = [];
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("prints help and exits 0", async () => {
    expect(await runCli(["--help"], { env: {}, output })).toBe(0);
    expect(lines).toEqual([getHelpText()]);
  });

  it("exits 2 when archive has no source", async () => {
    expect(await runCli(["archive"], { env: { OUTPUT_DIR: dir }, output })).toBe(2);
    expect(JSON.parse(lines[0])).toMatchObject({ level: "error", msg: "command_config_error", error: "archive requires --source <file>" });
  });

  it("exits 2 for an invalid environment setting", async () => {
    expect(await runCli(["status"], { env: { OUTPUT_DIR: dir, CONCURRENCY: "0" }, output })).toBe(2);
  });

  it("archives from a source file and leaves the ledger and its CSV export behind", async () => {
    const sourcePath = path.join(dir, "candidates.csv");
    fs.writeFileSync(sourcePath, "identifier,title,year,url\nB,Unknown host paper,1911,https://untrusted.example.net/b.pdf\n");
    const fetchFn = vi.fn<FetchFn>();

    const code = await runCli(["archive", "--source", sourcePath, "--out", dir], { env: { LOG_LEVEL: "warn" }, fetchFn, output });

    expect(code).toBe(0);
    expect(fetchFn).not.toHaveBeenCalled();
    const ledgerLines = fs.readFileSync(path.join(dir, "ledger.jsonl"), "utf-8").trimEnd().split("\n");
    expect(ledgerLines.map((line) => Reflect.get(Object(JSON.parse(line)), "type"))).toEqual(["attempt", "run"]);
    expect(JSON.parse(ledgerLines[0])).toMatchObject({ identifier: "B", outcome: "rejected", error: "untrusted-host" });
    expect(fs.existsSync(path.join(dir, "ledger.csv"))).toBe(true);
    expect(messages().at(-1)).toBe("metrics_summary");
  });

  it("exits 2 when the source file cannot be read", async () => {
    const code = await runCli(["archive", "--source", path.join(dir, "absent.csv"), "--out", dir], { env: {}, output });
    expect(code).toBe(2);
  });

  it("reports ledger statistics with the sqlite backend", async () => {
    const code = await runCli(["status", "--out", dir, "--ledger", "sqlite"], { env: {}, output });

    expect(code).toBe(0);
    expect(fs.existsSync(path.join(dir, "ledger.sqlite"))).toBe(true);
    expect(messages()).toContain("status_complete");
  });
});
