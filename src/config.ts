// CHANGE: Centralise configuration source with environment defaults.
// WHY: The credential and endpoints are read once here and handed to the request layer explicitly.
// SOURCE: internal reasoning

import * as dotenv from "dotenv";

dotenv.config();

/**
 * GitHub API endpoints and search limits.
 *
 * Invariant: `PAGE_SIZE` is the largest page the search API serves (100).
 */
export const GITHUB = {
  API_URL: process.env.GITHUB_API_URL ?? "https://api.github.com",
  TOKEN: process.env.GITHUB_TOKEN ?? "",
  PAGE_SIZE: 100,
  MAX_SEARCH_RESULTS: 1000
} as const;

/**
 * Network-level configuration for HTTP operations.
 */
export const NET = {
  TIMEOUT: Number.parseInt(process.env.HTTP_TIMEOUT ?? "10000", 10),
  USER_AGENT: "top-repos/1.0"
} as const;

export const ENRICHMENT = {
  RECENT_COMMIT_WINDOW_DAYS: 90
} as const;

/**
 * Quota reporting thresholds.
 *
 * Invariant: per-request quota reports rise from DEBUG to INFO once `remaining / limit` is at or below `LOW_REMAINING_RATIO`.
 */
export const RATE_LIMIT = {
  LOW_REMAINING_RATIO: 0.1
} as const;

export const LOGGING = {
  LEVEL: process.env.TOP_REPOS_LOG_LEVEL ?? "info"
} as const;
