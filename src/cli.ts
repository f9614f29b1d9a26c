// CHANGE: Extract CLI orchestration into importable functions for the entrypoint and tests.
// WHY: The run is strictly linear (count | fetch, enrich, export, report) and each step is reachable without process-wide side effects.
// SOURCE: internal reasoning

import { Command, InvalidArgumentError } from "commander";
import fs from "fs-extra";
import { fetchAllRepositories, fetchTotalCount } from "./api.js";
import { GITHUB, NET } from "./config.js";
import { enrichAll } from "./enricher.js";
import {
  type ColumnKey,
  DETAIL_COLUMNS,
  type ExportRow,
  exportRepositories,
  parseColumns,
  SUMMARY_COLUMNS
} from "./exporter.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { fetchRateLimitStatus, formatRateLimit, RateLimitMonitor } from "./rate-limit.js";
import { ConsoleProgressReporter, type ProgressReporter } from "./reporter.js";
import type { SearchFilter } from "./types.js";
import { defaultOutputPath } from "./utils/filename.js";
import { createHttpClient, describeHttpError, type HttpClient } from "./utils/http.js";

/**
 * Options as parsed by commander; `--no-enrich` maps to `enrich: false`.
 */
export interface CliOptions {
  readonly language: string;
  readonly minStars: number;
  readonly maxStars: number;
  readonly minForks: number;
  readonly output?: string;
  readonly count: boolean;
  readonly token?: string;
  readonly enrich: boolean;
  readonly columns?: ColumnKey[];
  readonly skipExisting: boolean;
  readonly verbose: boolean;
}

export interface SearchOptions {
  readonly filter: SearchFilter;
  readonly output?: string;
  readonly countOnly: boolean;
  readonly enrich: boolean;
  readonly columns?: readonly ColumnKey[];
  readonly skipExisting: boolean;
}

export interface RunDependencies {
  readonly client: HttpClient;
  readonly reporter: ProgressReporter;
  readonly now?: Date;
}

export type RunOutcome =
  | { readonly kind: "count"; readonly totalCount: number | null }
  | { readonly kind: "skipped"; readonly path: string }
  | { readonly kind: "empty" }
  | { readonly kind: "exported"; readonly path: string; readonly rows: number; readonly partial: boolean };

async function reportCount(client: HttpClient, filter: SearchFilter, monitor: RateLimitMonitor): Promise<RunOutcome> {
  try {
    const totalCount = await fetchTotalCount(client, filter, monitor);
    info(`Total matching repositories: ${totalCount}`);
    return { kind: "count", totalCount };
  } catch (cause) {
    const failure = describeHttpError(cause);
    logError(`Count query failed: status ${failure.status ?? "unknown"} - ${failure.message}`);
    return { kind: "count", totalCount: null };
  }
}

/**
 * Execute one search run: count-only, or fetch, enrich, export, and report the final quota.
 *
 * Search and enrichment failures are logged and degrade the result; export failures propagate.
 */
export async function runSearch(options: SearchOptions, deps: RunDependencies): Promise<RunOutcome> {
  const { client, reporter } = deps;
  const monitor = new RateLimitMonitor();

  if (options.countOnly) {
    return reportCount(client, options.filter, monitor);
  }

  const path = options.output ?? defaultOutputPath(options.filter);
  if (options.skipExisting && (await fs.pathExists(path))) {
    info(`Output ${path} already exists; delete it to regenerate.`);
    return { kind: "skipped", path };
  }

  const result = await fetchAllRepositories(client, options.filter, monitor);
  if (result.repositories.length === 0) {
    info("No repositories found.");
    return { kind: "empty" };
  }
  info(
    `Fetched ${result.repositories.length} repositories across ${result.pagesFetched} page(s) (total matches ${result.totalCount}).`
  );

  const rows: readonly ExportRow[] = options.enrich
    ? await enrichAll(client, result.repositories, { monitor, reporter, now: deps.now })
    : result.repositories;
  const columns = options.columns ?? (options.enrich ? DETAIL_COLUMNS : SUMMARY_COLUMNS);

  const written = await exportRepositories(path, rows, columns);
  info(`Saved ${written} repositories to ${path}.`);

  const finalStatus = (await fetchRateLimitStatus(client)) ?? monitor.latest();
  if (finalStatus) {
    info(formatRateLimit(finalStatus));
  }

  return { kind: "exported", path, rows: written, partial: result.partial };
}

/**
 * Default command action: build the client from explicit configuration and run the search.
 */
export async function searchAction(options: CliOptions): Promise<void> {
  if (options.verbose) {
    setLogLevel("debug");
  }
  const client = createHttpClient({
    baseUrl: GITHUB.API_URL,
    token: options.token ?? GITHUB.TOKEN,
    timeoutMs: NET.TIMEOUT,
    userAgent: NET.USER_AGENT
  });
  await runSearch(
    {
      filter: {
        language: options.language,
        minStars: options.minStars,
        maxStars: options.maxStars,
        minForks: options.minForks
      },
      output: options.output,
      countOnly: options.count,
      enrich: options.enrich,
      columns: options.columns,
      skipExisting: options.skipExisting
    },
    { client, reporter: new ConsoleProgressReporter() }
  );
}

/**
 * Strict integer parser for numeric flags.
 *
 * @throws InvalidArgumentError when the value is not a whole number.
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

function parseColumnsOption(value: string): ColumnKey[] {
  try {
    return parseColumns(value);
  } catch (cause) {
    throw new InvalidArgumentError(cause instanceof Error ? cause.message : String(cause));
  }
}

/**
 * Construct commander program with the search flags.
 *
 * @param action - Handler receiving the parsed options; tests substitute their own.
 */
export function buildProgram(action: (options: CliOptions) => Promise<void> = searchAction): Command {
  const program = new Command();
  program
    .name("top-repos")
    .description("Search GitHub repositories by language, stars, and forks, and export them to CSV.")
    .version("1.0.0")
    .requiredOption("--language <language>", "Programming language to filter by.")
    .requiredOption("--min-stars <count>", "Minimum number of stars.", parseInteger)
    .requiredOption("--max-stars <count>", "Maximum number of stars.", parseInteger)
    .option("--min-forks <count>", "Minimum number of forks.", parseInteger, 0)
    .option("--output <path>", "Output CSV file (default: <language>-<min>-<max>-repos.csv).")
    .option("--count", "Print the total number of matches and exit.", false)
    .option("--token <token>", "GitHub token (default: GITHUB_TOKEN).")
    .option("--no-enrich", "Skip contributor and recent-commit lookups.")
    .option("--columns <list>", "Comma-separated columns to export.", parseColumnsOption)
    .option("--skip-existing", "Leave an existing output file untouched.", false)
    .option("--verbose", "Enable debug logging.", false)
    .action(async (options: CliOptions) => action(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
