import { AppConfig, LedgerBackend, loadConfig, validateConfig } from "../config";
import { CommandContext, runArchiveCommand, runDiscoverCommand, runExport, runStatus } from "../core/commands";
import { CancelledError, ConfigurationError, errorMessage } from "../core/errors";
import { FetchFn } from "../core/fetch";
import { createLedger } from "../ledger";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";

export type CommandName = "archive" | "discover" | "status" | "export";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  sourcePath?: string;
  outputDir?: string;
  masterPath?: string;
  force: boolean;
  allowLicensed: boolean;
  acceptScanOnly: boolean;
  insecure: boolean;
  trustHosts: string[];
  concurrency?: number;
  timeoutMs?: number;
  retries?: number;
  runTimeoutMs?: number;
  maxCandidates?: number;
  ledgerBackend?: LedgerBackend;
}

const HELP_TEXT = `
Usage:
  primary-preserver <command> [options]

Commands:
  archive --source <file>   Fetch, verify and archive candidates from a CSV, TSV or JSONL file
  discover --master <csv>   Query the index and list records missing from the master catalog
  status                    Show ledger statistics and recent runs
  export                    Regenerate ledger.csv from the ledger

Options:
  --config <path>           Optional path to JSON config file
  --source <path>           Candidate source file (archive)
  --master <path>           Master catalog CSV, read only (discover)
  --out <dir>               Output directory for ledger, archive and reports
  --force                   Re-fetch identifiers that already have an archived record
  --allow-licensed          Accept hosts that require a licence for this run
  --accept-scan-only        Accept scan-only hosts and PDFs without extractable text
  --trust-host <host>       Trust an extra public-domain host for this run (repeatable)
  --concurrency <n>         Number of fetch workers
  --timeout-ms <n>          Per-request timeout
  --retries <n>             Retries per URL for transient failures
  --run-timeout-ms <n>      Cancel the run after this long (0 disables)
  --max-candidates <n>      Only process the first n candidates
  --ledger <jsonl|sqlite>   Ledger backend
  --insecure                Ignore TLS certificate errors (use only when required)
  -h, --help                Show this help

Environment:
  ADS_TOKEN                 Index API token for discover
  LOG_LEVEL                 debug, info, warn or error
`;

const VALUE_FLAGS = new Set([
  "--config",
  "--source",
  "--master",
  "--out",
  "--trust-host",
  "--concurrency",
  "--timeout-ms",
  "--retries",
  "--run-timeout-ms",
  "--max-candidates",
  "--ledger",
]);

const SWITCH_FLAGS = new Set(["--force", "--allow-licensed", "--accept-scan-only", "--insecure"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "archive" || raw === "discover" || raw === "status" || raw === "export") {
    return raw;
  }
  return undefined;
}

function parseCount(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseLedgerBackend(raw: string | undefined): LedgerBackend | undefined {
  if (raw === undefined || raw === "jsonl" || raw === "sqlite") {
    return raw;
  }
  throw new ConfigurationError(`--ledger expects jsonl or sqlite, got "${raw}"`);
}

/** Throws ConfigurationError on unknown flags, missing values and malformed numbers. */
export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const values = new Map<string, string[]>();
  const switches = new Set<string>();
  for (let index = 1; index < argv.length; index += 1) {
    const flag = argv[index];
    if (SWITCH_FLAGS.has(flag)) {
      switches.add(flag);
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new ConfigurationError(`Unknown option: ${flag}`);
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    values.set(flag, [...(values.get(flag) ?? []), value]);
    index += 1;
  }

  const last = (flag: string): string | undefined => values.get(flag)?.at(-1);
  const parsed: ParsedCliArgs = {
    command,
    force: switches.has("--force"),
    allowLicensed: switches.has("--allow-licensed"),
    acceptScanOnly: switches.has("--accept-scan-only"),
    insecure: switches.has("--insecure"),
    trustHosts: values.get("--trust-host") ?? [],
  };

  const configPath = last("--config");
  const sourcePath = last("--source");
  const outputDir = last("--out");
  const masterPath = last("--master");
  const concurrency = parseCount("--concurrency", last("--concurrency"));
  const timeoutMs = parseCount("--timeout-ms", last("--timeout-ms"));
  const retries = parseCount("--retries", last("--retries"));
  const runTimeoutMs = parseCount("--run-timeout-ms", last("--run-timeout-ms"));
  const maxCandidates = parseCount("--max-candidates", last("--max-candidates"));
  const ledgerBackend = parseLedgerBackend(last("--ledger"));

  return {
    ...parsed,
    ...(configPath !== undefined ? { configPath } : {}),
    ...(sourcePath !== undefined ? { sourcePath } : {}),
    ...(outputDir !== undefined ? { outputDir } : {}),
    ...(masterPath !== undefined ? { masterPath } : {}),
    ...(concurrency !== undefined ? { concurrency } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(retries !== undefined ? { retries } : {}),
    ...(runTimeoutMs !== undefined ? { runTimeoutMs } : {}),
    ...(maxCandidates !== undefined ? { maxCandidates } : {}),
    ...(ledgerBackend !== undefined ? { ledgerBackend } : {}),
  };
}

/** Flags win over env and file; assumption flags can only widen what the config accepts. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  const next: AppConfig = {
    ...config,
    ignoreHttpsErrors: config.ignoreHttpsErrors || parsed.insecure,
    concurrency: parsed.concurrency ?? config.concurrency,
    requestTimeoutMs: parsed.timeoutMs ?? config.requestTimeoutMs,
    maxRetries: parsed.retries ?? config.maxRetries,
    runTimeoutMs: parsed.runTimeoutMs ?? config.runTimeoutMs,
    outputDir: parsed.outputDir ?? config.outputDir,
    ledgerBackend: parsed.ledgerBackend ?? config.ledgerBackend,
    extraTrustedHosts: [...config.extraTrustedHosts, ...parsed.trustHosts],
    accepted: {
      allowLicensed: config.accepted.allowLicensed || parsed.allowLicensed,
      acceptScanOnly: config.accepted.acceptScanOnly || parsed.acceptScanOnly,
    },
  };
  validateConfig(next);
  return next;
}

interface PreparedCommand {
  parsed: ParsedCliArgs;
  config: AppConfig;
}

function prepareCommand(argv: string[], env: NodeJS.ProcessEnv): PreparedCommand | "help" {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    return "help";
  }
  const config = applyCliOverrides(loadConfig(parsed.configPath, env), parsed);
  if (parsed.command === "archive" && !parsed.sourcePath) {
    throw new ConfigurationError("archive requires --source <file>");
  }
  if (parsed.command === "discover" && !parsed.masterPath) {
    throw new ConfigurationError("discover requires --master <csv>");
  }
  return { parsed, config };
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchFn;
  /** Receives help text and log lines; defaults to the console. */
  output?: (line: string) => void;
}

/** Exit code 2 for configuration errors, 1 for any other fatal error, 0 otherwise. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const output = options.output;
  const runId = createRunId();
  const logger = new Logger(
    { component: "cli", runId },
    {
      minLevel: parseLogLevel(env.LOG_LEVEL) ?? "info",
      ...(output ? { output: (line: string) => output(line) } : {}),
    },
  );

  let prepared: PreparedCommand | "help";
  try {
    prepared = prepareCommand(argv, env);
  } catch (error) {
    logger.error("command_config_error", { error: errorMessage(error) });
    return error instanceof ConfigurationError ? 2 : 1;
  }
  if (prepared === "help") {
    (output ?? console.log)(HELP_TEXT.trim());
    return 0;
  }
  const { parsed, config } = prepared;

  const metrics = new MetricsRegistry();
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("command_interrupted", { signal });
    controller.abort(new CancelledError(`interrupted by ${signal}`));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const context: CommandContext = {
    runId,
    config,
    logger,
    metrics,
    signal: controller.signal,
    ...(options.fetchFn ? { fetchFn: options.fetchFn } : {}),
  };

  logger.info("command_start", {
    command: parsed.command,
    force: parsed.force,
    outputDir: config.outputDir,
    ledgerBackend: config.ledgerBackend,
    concurrency: config.concurrency,
    allowLicensed: config.accepted.allowLicensed,
    acceptScanOnly: config.accepted.acceptScanOnly,
  });

  try {
    if (parsed.command === "discover") {
      await runDiscoverCommand(
        { ...context, logger: logger.child("discover") },
        { masterPath: parsed.masterPath ?? "", token: env.ADS_TOKEN },
      );
    } else {
      const ledger = createLedger(config.outputDir, config.ledgerBackend, logger.child("ledger"));
      try {
        switch (parsed.command) {
          case "archive":
            await runArchiveCommand(
              { ...context, logger: logger.child("archive") },
              ledger,
              {
                sourcePath: parsed.sourcePath ?? "",
                force: parsed.force,
                ...(parsed.maxCandidates !== undefined ? { maxCandidates: parsed.maxCandidates } : {}),
              },
            );
            break;
          case "status":
            await runStatus({ ...context, logger: logger.child("status") }, ledger);
            break;
          case "export":
            await runExport({ ...context, logger: logger.child("export") }, ledger);
            break;
        }
      } finally {
        await ledger.close();
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return error instanceof ConfigurationError ? 2 : 1;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    metrics.printSummary(output);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
