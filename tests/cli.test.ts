// CHANGE: Confirm CLI flags parse into search options.
// WHY: Required flags, integer parsing, and the enrichment toggle are enforced before any request.
// SOURCE: internal reasoning

import { describe, expect, it, vi } from "vitest";
import { buildProgram, type CliOptions, parseInteger } from "../src/cli.js";

function quietProgram(action: (options: CliOptions) => Promise<void>) {
  return buildProgram(action)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe("CLI program", () => {
  it("parses required flags and applies defaults", async () => {
    const action = vi.fn(async (_options: CliOptions) => undefined);

    await quietProgram(action).parseAsync([
      "node",
      "top-repos",
      "--language",
      "rust",
      "--min-stars",
      "1000",
      "--max-stars",
      "5000"
    ]);

    expect(action).toHaveBeenCalledTimes(1);
    expect(action.mock.calls[0]?.[0]).toMatchObject({
      language: "rust",
      minStars: 1000,
      maxStars: 5000,
      minForks: 0,
      count: false,
      enrich: true,
      skipExisting: false,
      verbose: false
    });
    expect(action.mock.calls[0]?.[0].output).toBeUndefined();
    expect(action.mock.calls[0]?.[0].token).toBeUndefined();
  });

  it("maps optional flags", async () => {
    const action = vi.fn(async (_options: CliOptions) => undefined);

    await quietProgram(action).parseAsync([
      "node",
      "top-repos",
      "--language",
      "go",
      "--min-stars",
      "25000",
      "--max-stars",
      "40000",
      "--min-forks",
      "50",
      "--output",
      "top-go-projects.csv",
      "--count",
      "--token",
      "test-token",
      "--no-enrich",
      "--columns",
      "name,stars",
      "--skip-existing"
    ]);

    expect(action.mock.calls[0]?.[0]).toMatchObject({
      minForks: 50,
      output: "top-go-projects.csv",
      count: true,
      token: "test-token",
      enrich: false,
      columns: ["name", "stars"],
      skipExisting: true
    });
  });

  it("rejects a missing required flag", async () => {
    const action = vi.fn(async (_options: CliOptions) => undefined);

    await expect(
      quietProgram(action).parseAsync(["node", "top-repos", "--language", "rust", "--min-stars", "1"])
    ).rejects.toMatchObject({ code: "commander.missingMandatoryOptionValue" });
    expect(action).not.toHaveBeenCalled();
  });

  it("rejects non-integer star counts and unknown columns", async () => {
    const action = vi.fn(async (_options: CliOptions) => undefined);
    const base = ["node", "top-repos", "--language", "rust", "--max-stars", "10"];

    await expect(quietProgram(action).parseAsync([...base, "--min-stars", "1k"])).rejects.toMatchObject({
      code: "commander.invalidArgument"
    });
    await expect(
      quietProgram(action).parseAsync([...base, "--min-stars", "1", "--columns", "owner"])
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(action).not.toHaveBeenCalled();
  });
});

describe("parseInteger", () => {
  it("accepts whole numbers only", () => {
    expect(parseInteger("42")).toBe(42);
    expect(parseInteger(" -3 ")).toBe(-3);
    expect(() => parseInteger("4.5")).toThrow("Not an integer.");
  });
});
