// CHANGE: Enrich search results with contributor and recent-commit counts.
// WHY: Each repository is looked up on its own; one failed lookup yields a failure result and never aborts the run.
// SOURCE: internal reasoning

import { ENRICHMENT, GITHUB } from "./config.js";
import { debug, error as logError, info } from "./logger.js";
import type { RateLimitMonitor } from "./rate-limit.js";
import { type ProgressReporter, silentReporter } from "./reporter.js";
import type { CountResult, JsonValue, RepositoryDetail, RepositorySummary } from "./types.js";
import { describeHttpError, type HttpClient, type QueryParams } from "./utils/http.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface EnrichOptions {
  readonly monitor?: RateLimitMonitor;
  readonly reporter?: ProgressReporter;
  readonly now?: Date;
}

/**
 * ISO-8601 lower bound of the recent-commit window ending at `now`.
 */
export function recentCommitsSince(now: Date, days: number = ENRICHMENT.RECENT_COMMIT_WINDOW_DAYS): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}

/**
 * Count the entries of one unpaginated list response.
 *
 * A 204 (empty repository) counts as zero; a non-array body is a failure.
 */
async function countListing(
  client: HttpClient,
  url: string,
  params: QueryParams,
  subject: string,
  monitor?: RateLimitMonitor
): Promise<CountResult> {
  try {
    const response = await client.getJson<JsonValue>(url, params);
    monitor?.observe(response.headers);
    if (response.status === 204) {
      return { ok: true, count: 0 };
    }
    if (!Array.isArray(response.data)) {
      logError(`${subject} returned an unexpected body (status ${response.status})`);
      return { ok: false, reason: "unexpected response body" };
    }
    return { ok: true, count: response.data.length };
  } catch (cause) {
    const failure = describeHttpError(cause);
    monitor?.observe(failure.headers);
    const reason = `status ${failure.status ?? "unknown"} - ${failure.message}`;
    logError(`${subject} failed: ${reason}`);
    return { ok: false, reason };
  }
}

export function countContributors(
  client: HttpClient,
  summary: RepositorySummary,
  monitor?: RateLimitMonitor
): Promise<CountResult> {
  return countListing(
    client,
    summary.contributorsUrl,
    { per_page: GITHUB.PAGE_SIZE },
    `Contributors lookup for ${summary.fullName}`,
    monitor
  );
}

export function countRecentCommits(
  client: HttpClient,
  summary: RepositorySummary,
  now: Date,
  monitor?: RateLimitMonitor
): Promise<CountResult> {
  return countListing(
    client,
    summary.commitsUrl,
    { since: recentCommitsSince(now), per_page: GITHUB.PAGE_SIZE },
    `Recent commits lookup for ${summary.fullName}`,
    monitor
  );
}

function countOrZero(result: CountResult): number {
  return result.ok ? result.count : 0;
}

/**
 * Merge a summary with its two lookups, issued one after the other.
 */
export async function enrichRepository(
  client: HttpClient,
  summary: RepositorySummary,
  options: EnrichOptions = {}
): Promise<RepositoryDetail> {
  const now = options.now ?? new Date();
  const contributors = await countContributors(client, summary, options.monitor);
  const recentCommits = await countRecentCommits(client, summary, now, options.monitor);
  return {
    ...summary,
    contributorCount: countOrZero(contributors),
    recentCommitCount: countOrZero(recentCommits),
    contributors,
    recentCommits
  };
}

/**
 * Enrich every summary sequentially, preserving input order.
 */
export async function enrichAll(
  client: HttpClient,
  summaries: readonly RepositorySummary[],
  options: EnrichOptions = {}
): Promise<RepositoryDetail[]> {
  const reporter = options.reporter ?? silentReporter;
  const now = options.now ?? new Date();
  const details: RepositoryDetail[] = [];
  let failures = 0;

  for (const [index, summary] of summaries.entries()) {
    const detail = await enrichRepository(client, summary, { ...options, now });
    if (!detail.contributors.ok || !detail.recentCommits.ok) {
      failures += 1;
    }
    details.push(detail);
    reporter.progress(index + 1, summaries.length, summary.fullName);
    debug(
      `Enriched ${summary.fullName}: contributors=${detail.contributorCount} recentCommits=${detail.recentCommitCount}`
    );
  }
  reporter.finish();

  info(
    failures > 0
      ? `Enriched ${details.length} repositories; ${failures} with incomplete counts recorded as 0.`
      : `Enriched ${details.length} repositories.`
  );
  return details;
}
