// CHANGE: Validate CSV rendering, column selection, and file output.
// WHY: Output must be deterministic and quote descriptions containing delimiters or line breaks.
// SOURCE: internal reasoning

import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DETAIL_COLUMNS,
  escapeCsvField,
  exportRepositories,
  parseColumns,
  SUMMARY_COLUMNS,
  toCsv
} from "../src/exporter.js";
import type { RepositoryDetail, RepositorySummary } from "../src/types.js";

const summary: RepositorySummary = {
  name: "ripgrep",
  fullName: "owner/ripgrep",
  starCount: 4800,
  forkCount: 210,
  url: "https://github.com/owner/ripgrep",
  description: "Fast, \"recursive\" search\nfor text",
  archived: false,
  contributorsUrl: "https://api.github.com/repos/owner/ripgrep/contributors",
  commitsUrl: "https://api.github.com/repos/owner/ripgrep/commits"
};

const detail: RepositoryDetail = {
  ...summary,
  name: "tokio",
  description: null,
  archived: true,
  contributorCount: 0,
  recentCommitCount: 17,
  contributors: { ok: false, reason: "status 403 - too large" },
  recentCommits: { ok: true, count: 17 }
};

describe("escapeCsvField", () => {
  it("quotes delimiters, quotes, and line breaks only", () => {
    expect(escapeCsvField("plain text")).toBe("plain text");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("line\r\nbreak")).toBe('"line\r\nbreak"');
  });
});

describe("toCsv", () => {
  it("writes the summary column set", () => {
    expect(toCsv([summary], SUMMARY_COLUMNS)).toBe(
      "name,stars,forks,url,description\r\n" +
        'ripgrep,4800,210,https://github.com/owner/ripgrep,"Fast, ""recursive"" search\nfor text"\r\n'
    );
  });

  it("writes enrichment columns and renders a null description as empty", () => {
    expect(toCsv([detail], DETAIL_COLUMNS)).toBe(
      "name,stars,forks,url,description,archived,contributorCount,recentCommitCount\r\n" +
        "tokio,4800,210,https://github.com/owner/ripgrep,,true,0,17\r\n"
    );
  });

  it("leaves enrichment cells empty for summaries", () => {
    expect(toCsv([{ ...summary, description: "grep" }], ["name", "contributorCount", "archived"])).toBe(
      "name,contributorCount,archived\r\nripgrep,,false\r\n"
    );
  });

  it("writes only the header when there are no rows", () => {
    expect(toCsv([], ["name", "stars"])).toBe("name,stars\r\n");
  });
});

describe("parseColumns", () => {
  it("accepts a known subset in the given order", () => {
    expect(parseColumns(" stars, name ,recentCommitCount")).toEqual(["stars", "name", "recentCommitCount"]);
  });

  it("rejects unknown columns and empty lists", () => {
    expect(() => parseColumns("name,owner")).toThrow('Unknown column "owner"');
    expect(() => parseColumns(" , ")).toThrow("Column list is empty.");
  });
});

describe("exportRepositories", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "top-repos-export-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("produces byte-identical files when run twice", async () => {
    const target = path.join(dir, "out.csv");

    await exportRepositories(target, [summary, detail], DETAIL_COLUMNS);
    const first = await fs.readFile(target);
    await exportRepositories(target, [summary, detail], DETAIL_COLUMNS);
    const second = await fs.readFile(target);

    expect(second.equals(first)).toBe(true);
    expect(first.toString("utf8")).toBe(toCsv([summary, detail], DETAIL_COLUMNS));
  });

  it("overwrites an existing file and creates missing directories", async () => {
    const target = path.join(dir, "nested", "out.csv");
    await fs.outputFile(target, "stale content that is longer than the new file\n".repeat(20));

    const written = await exportRepositories(target, [summary], ["name"]);

    expect(written).toBe(1);
    expect(await fs.readFile(target, "utf8")).toBe("name\r\nripgrep\r\n");
  });

  it("propagates write failures", async () => {
    await expect(exportRepositories(dir, [summary], ["name"])).rejects.toThrow();
  });
});
