#!/usr/bin/env node
// CHANGE: Delegate execution to the CLI runner.
// WHY: Importing the CLI helpers must not trigger argument parsing.
// SOURCE: internal reasoning

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

/**
 * Decide whether the script at `scriptPath` is this module.
 *
 * Symlinked binaries are resolved first; a path that cannot be resolved (such as
 * `node dist/index` without its extension) is compared as given.
 *
 * @param scriptPath - `process.argv[1]`, if any.
 * @param moduleUrl - `import.meta.url` of the entry module.
 */
export function isDirectExecution(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  let resolved = scriptPath;
  try {
    resolved = realpathSync(scriptPath);
  } catch {
    resolved = scriptPath;
  }
  return pathToFileURL(resolved).href === moduleUrl;
}

if (isDirectExecution(process.argv[1], import.meta.url)) {
  void runCli(process.argv);
}

export { runCli };
