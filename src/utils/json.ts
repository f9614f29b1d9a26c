// CHANGE: Share a record guard for unvalidated JSON bodies.
// WHY: Response bodies are narrowed field by field instead of cast to an expected shape.
// SOURCE: internal reasoning

import type { JsonValue } from "../types.js";

export type JsonRecord = { readonly [key: string]: JsonValue };

export function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
