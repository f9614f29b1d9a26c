// CHANGE: Define typed models for repository search, enrichment, and rate-limit reporting.
// WHY: Search items, enrichment results, and export rows share these shapes across modules.
// SOURCE: internal reasoning

/**
 * JSON-like value type used for payloads before validation, without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Criteria narrowing which repositories the search returns.
 *
 * Invariant: `minStars <= maxStars` is the caller's responsibility and is not checked.
 */
export interface SearchFilter {
  readonly language: string;
  readonly minStars: number;
  readonly maxStars: number;
  readonly minForks: number;
}

/**
 * One repository as returned by a search page.
 *
 * @property contributorsUrl - API locator of the contributors list.
 * @property commitsUrl - API locator of the commit list, URI template suffix removed.
 */
export interface RepositorySummary {
  readonly name: string;
  readonly fullName: string;
  readonly starCount: number;
  readonly forkCount: number;
  readonly url: string;
  readonly description: string | null;
  readonly archived: boolean;
  readonly contributorsUrl: string;
  readonly commitsUrl: string;
}

/**
 * Outcome of a count-producing sub-request. A failure is kept distinct from a genuine zero.
 */
export type CountResult =
  | { readonly ok: true; readonly count: number }
  | { readonly ok: false; readonly reason: string };

/**
 * Repository summary merged with enrichment counts.
 *
 * Invariant: `contributorCount` and `recentCommitCount` are 0 whenever the matching result failed.
 */
export interface RepositoryDetail extends RepositorySummary {
  readonly contributorCount: number;
  readonly recentCommitCount: number;
  readonly contributors: CountResult;
  readonly recentCommits: CountResult;
}

/**
 * Quota snapshot read from response headers or the status endpoint. Never persisted.
 */
export interface RateLimitStatus {
  readonly remaining: number;
  readonly limit: number;
  readonly resetAt: Date;
}

/**
 * One decoded page of search results.
 */
export interface SearchPage {
  readonly totalCount: number;
  readonly items: readonly RepositorySummary[];
}

/**
 * Accumulated search outcome across pages.
 *
 * @property partial - True when a failed request ended pagination early.
 */
export interface SearchResult {
  readonly repositories: readonly RepositorySummary[];
  readonly totalCount: number;
  readonly pagesFetched: number;
  readonly partial: boolean;
}
