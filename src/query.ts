// CHANGE: Build repository search qualifiers and request parameters from a filter.
// WHY: Values pass through unvalidated; malformed language names are rejected by the API itself.
// SOURCE: internal reasoning

import { GITHUB } from "./config.js";
import type { SearchFilter } from "./types.js";

export interface SearchParams {
  readonly q: string;
  readonly sort: "stars";
  readonly order: "desc";
  readonly per_page: number;
  readonly page: number;
}

/**
 * Compose the `q` qualifier string, e.g. `language:rust stars:1000..5000 forks:>=0`.
 */
export function buildSearchQuery(filter: SearchFilter): string {
  return `language:${filter.language} stars:${filter.minStars}..${filter.maxStars} forks:>=${filter.minForks}`;
}

/**
 * Parameters for one search page, sorted by star count descending.
 */
export function buildSearchParams(filter: SearchFilter, page: number, perPage: number = GITHUB.PAGE_SIZE): SearchParams {
  return {
    q: buildSearchQuery(filter),
    sort: "stars",
    order: "desc",
    per_page: perPage,
    page
  };
}
