// CHANGE: Implement repository search requests, item validation, and pagination.
// WHY: Pagination stops on a short page, on the reported total, or on the first failed request, keeping what was gathered.
// SOURCE: internal reasoning

import { GITHUB } from "./config.js";
import { debug, error as logError, info } from "./logger.js";
import { buildSearchParams } from "./query.js";
import type { RateLimitMonitor } from "./rate-limit.js";
import type { JsonValue, RepositorySummary, SearchFilter, SearchPage, SearchResult } from "./types.js";
import { describeHttpError, type HttpClient } from "./utils/http.js";
import { isRecord, type JsonRecord } from "./utils/json.js";

const SEARCH_PATH = "/search/repositories";

export interface FetchedSearchPage extends SearchPage {
  readonly headers: Record<string, string>;
}

function assertHasItems(value: JsonValue): asserts value is {
  readonly items: readonly JsonValue[];
  readonly total_count?: JsonValue;
} {
  if (!isRecord(value) || !Array.isArray(value.items)) {
    throw new Error("Malformed search response: missing items array");
  }
}

/**
 * Strip a URI template suffix such as `{/sha}` from an API locator.
 */
export function stripUriTemplate(url: string): string {
  return url.replace(/\{[^}]*\}$/, "");
}

function locator(raw: JsonRecord, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === "string" && value.length > 0 ? stripUriTemplate(value) : fallback;
}

/**
 * Map one search item to a summary.
 *
 * @throws Error when identifying fields or counts are missing.
 */
export function toRepositorySummary(raw: JsonValue): RepositorySummary {
  if (
    !isRecord(raw) ||
    typeof raw.name !== "string" ||
    typeof raw.html_url !== "string" ||
    typeof raw.stargazers_count !== "number" ||
    typeof raw.forks_count !== "number"
  ) {
    throw new Error("Malformed repository item in search response");
  }
  const fullName = typeof raw.full_name === "string" ? raw.full_name : raw.name;
  return {
    name: raw.name,
    fullName,
    starCount: raw.stargazers_count,
    forkCount: raw.forks_count,
    url: raw.html_url,
    description: typeof raw.description === "string" ? raw.description : null,
    archived: raw.archived === true,
    contributorsUrl: locator(raw, "contributors_url", `/repos/${fullName}/contributors`),
    commitsUrl: locator(raw, "commits_url", `/repos/${fullName}/commits`)
  };
}

/**
 * Request a single page of search results.
 */
export async function fetchSearchPage(
  client: HttpClient,
  filter: SearchFilter,
  page: number,
  perPage: number = GITHUB.PAGE_SIZE
): Promise<FetchedSearchPage> {
  const params = buildSearchParams(filter, page, perPage);
  const response = await client.getJson<JsonValue>(SEARCH_PATH, { ...params });
  debug(`Search page ${page} (${params.q}) answered with status ${response.status}`);
  const body = response.data;
  assertHasItems(body);
  const items = body.items.map(toRepositorySummary);
  return {
    totalCount: typeof body.total_count === "number" ? body.total_count : items.length,
    items,
    headers: response.headers
  };
}

/**
 * Count-only query: ask for one item and read `total_count`.
 */
export async function fetchTotalCount(
  client: HttpClient,
  filter: SearchFilter,
  monitor?: RateLimitMonitor
): Promise<number> {
  try {
    const page = await fetchSearchPage(client, filter, 1, 1);
    monitor?.observe(page.headers);
    return page.totalCount;
  } catch (cause) {
    monitor?.observe(describeHttpError(cause).headers);
    throw cause;
  }
}

/**
 * Fetch every result page for the filter, in the order the API serves them (stars descending).
 *
 * Invariant: the result never holds more entries than the reported `total_count`.
 */
export async function fetchAllRepositories(
  client: HttpClient,
  filter: SearchFilter,
  monitor: RateLimitMonitor,
  perPage: number = GITHUB.PAGE_SIZE
): Promise<SearchResult> {
  const repositories: RepositorySummary[] = [];
  let totalCount = 0;
  let pagesFetched = 0;
  let partial = false;

  for (let page = 1; ; page += 1) {
    let fetched: FetchedSearchPage;
    try {
      fetched = await fetchSearchPage(client, filter, page, perPage);
    } catch (cause) {
      const failure = describeHttpError(cause);
      monitor.observe(failure.headers);
      logError(`Search failed on page ${page}: status ${failure.status ?? "unknown"} - ${failure.message}`);
      partial = true;
      break;
    }

    pagesFetched += 1;
    monitor.observe(fetched.headers);
    totalCount = fetched.totalCount;

    const ceiling = Math.min(totalCount, GITHUB.MAX_SEARCH_RESULTS);
    repositories.push(...fetched.items.slice(0, Math.max(0, ceiling - repositories.length)));
    debug(`Accumulated ${repositories.length}/${totalCount} repositories after page ${page}`);

    if (fetched.items.length < perPage || repositories.length >= ceiling) {
      break;
    }
  }

  if (partial) {
    info(`Search ended early; continuing with ${repositories.length} repositories gathered so far.`);
  }
  return { repositories, totalCount, pagesFetched, partial };
}
