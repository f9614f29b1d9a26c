// CHANGE: Observe GitHub quota headers and the status endpoint without throttling.
// WHY: Quota exhaustion mid-run is reported; callers handle the resulting failures on their own paths.
// SOURCE: internal reasoning

import { RATE_LIMIT } from "./config.js";
import { debug, error as logError, info } from "./logger.js";
import type { JsonValue, RateLimitStatus } from "./types.js";
import { describeHttpError, type HttpClient } from "./utils/http.js";
import { isRecord } from "./utils/json.js";

function toInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

/**
 * Read quota fields from normalised (lower-case) response headers.
 *
 * @returns Status, or undefined when any field is absent or not an integer.
 */
export function parseRateLimit(headers: Readonly<Record<string, string>>): RateLimitStatus | undefined {
  const remaining = toInteger(headers["x-ratelimit-remaining"]);
  const limit = toInteger(headers["x-ratelimit-limit"]);
  const reset = toInteger(headers["x-ratelimit-reset"]);
  if (remaining === undefined || limit === undefined || reset === undefined) {
    return undefined;
  }
  return { remaining, limit, resetAt: new Date(reset * 1000) };
}

export function formatRateLimit(status: RateLimitStatus): string {
  return `Rate limit: ${status.remaining}/${status.limit} remaining, resets at ${status.resetAt.toISOString()}`;
}

/**
 * True when the remaining quota has fallen to the configured share of the limit.
 */
export function isQuotaLow(status: RateLimitStatus, ratio: number = RATE_LIMIT.LOW_REMAINING_RATIO): boolean {
  return status.remaining <= status.limit * ratio;
}

/**
 * Tracks the most recent quota snapshot seen across requests.
 */
export class RateLimitMonitor {
  private current: RateLimitStatus | undefined;

  /**
   * Record quota headers from a completed or failed request.
   *
   * The report is logged at INFO while the quota is low, at DEBUG otherwise.
   *
   * @returns Parsed status, or undefined when the response carried no quota headers.
   */
  observe(headers: Readonly<Record<string, string>>): RateLimitStatus | undefined {
    const status = parseRateLimit(headers);
    if (status) {
      this.current = status;
      const report = formatRateLimit(status);
      if (isQuotaLow(status)) {
        info(report);
      } else {
        debug(report);
      }
    }
    return status;
  }

  latest(): RateLimitStatus | undefined {
    return this.current;
  }
}

/**
 * Query the dedicated rate-limit endpoint, which does not count against the quota.
 *
 * @returns Core quota status, or undefined if the request fails or the body is malformed.
 */
export async function fetchRateLimitStatus(client: HttpClient): Promise<RateLimitStatus | undefined> {
  try {
    const response = await client.getJson<JsonValue>("/rate_limit");
    const rate = isRecord(response.data) ? response.data.rate : undefined;
    if (
      rate === undefined ||
      !isRecord(rate) ||
      typeof rate.remaining !== "number" ||
      typeof rate.limit !== "number" ||
      typeof rate.reset !== "number"
    ) {
      logError("Rate limit endpoint returned an unexpected body.");
      return undefined;
    }
    return { remaining: rate.remaining, limit: rate.limit, resetAt: new Date(rate.reset * 1000) };
  } catch (cause) {
    const failure = describeHttpError(cause);
    logError(`Rate limit lookup failed: status ${failure.status ?? "unknown"} - ${failure.message}`);
    return undefined;
  }
}
