// CHANGE: Serialise repositories to CSV with a configurable column set.
// WHY: Runs without enrichment write the summary columns only; output is byte-stable for the same rows.
// SOURCE: internal reasoning

import fs from "fs-extra";
import { debug } from "./logger.js";
import type { RepositoryDetail, RepositorySummary } from "./types.js";

export const ALL_COLUMNS = [
  "name",
  "stars",
  "forks",
  "url",
  "description",
  "archived",
  "contributorCount",
  "recentCommitCount"
] as const;

export type ColumnKey = (typeof ALL_COLUMNS)[number];

export const SUMMARY_COLUMNS: readonly ColumnKey[] = ["name", "stars", "forks", "url", "description"];

export const DETAIL_COLUMNS: readonly ColumnKey[] = ALL_COLUMNS;

export type ExportRow = RepositorySummary | RepositoryDetail;

function isDetail(row: ExportRow): row is RepositoryDetail {
  return "contributorCount" in row;
}

const cellValue: Record<ColumnKey, (row: ExportRow) => string> = {
  name: row => row.name,
  stars: row => String(row.starCount),
  forks: row => String(row.forkCount),
  url: row => row.url,
  description: row => row.description ?? "",
  archived: row => String(row.archived),
  contributorCount: row => (isDetail(row) ? String(row.contributorCount) : ""),
  recentCommitCount: row => (isDetail(row) ? String(row.recentCommitCount) : "")
};

const knownColumns: ReadonlySet<string> = new Set(ALL_COLUMNS);

function isColumnKey(value: string): value is ColumnKey {
  return knownColumns.has(value);
}

/**
 * Parse a comma-separated column list such as `name,stars,url`.
 *
 * @throws Error on an unknown column or an empty list.
 */
export function parseColumns(list: string): ColumnKey[] {
  const names = list
    .split(",")
    .map(name => name.trim())
    .filter(name => name.length > 0);
  if (names.length === 0) {
    throw new Error("Column list is empty.");
  }
  return names.map(name => {
    if (!isColumnKey(name)) {
      throw new Error(`Unknown column "${name}"; expected one of ${ALL_COLUMNS.join(", ")}.`);
    }
    return name;
  });
}

/**
 * Quote a field when it holds a delimiter, quote, or line break; embedded quotes are doubled.
 */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render header plus one line per row, each terminated by CRLF as RFC 4180 lays out.
 */
export function toCsv(rows: readonly ExportRow[], columns: readonly ColumnKey[]): string {
  const lines = [
    columns.join(","),
    ...rows.map(row => columns.map(column => escapeCsvField(cellValue[column](row))).join(","))
  ];
  return `${lines.join("\r\n")}\r\n`;
}

/**
 * Write rows to `path` as UTF-8 CSV, creating parent directories and replacing any existing file.
 *
 * Write failures propagate to the caller.
 */
export async function exportRepositories(
  path: string,
  rows: readonly ExportRow[],
  columns: readonly ColumnKey[]
): Promise<number> {
  await fs.outputFile(path, toCsv(rows, columns), "utf8");
  debug(`Wrote ${rows.length} rows with columns [${columns.join(", ")}] to ${path}`);
  return rows.length;
}
