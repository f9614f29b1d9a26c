// CHANGE: Derive the default CSV name from the search filter.
// WHY: Language names such as "c#" or "objective-c/c++" must still yield one valid file name.
// SOURCE: internal reasoning

import sanitize from "sanitize-filename";
import type { SearchFilter } from "../types.js";

/**
 * Default output path, e.g. `rust-1000-5000-repos.csv`.
 */
export function defaultOutputPath(filter: SearchFilter): string {
  return sanitize(`${filter.language.toLowerCase()}-${filter.minStars}-${filter.maxStars}-repos.csv`);
}
