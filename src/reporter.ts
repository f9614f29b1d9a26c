// CHANGE: Isolate enrichment progress output behind a narrow interface.
// WHY: Fetch and enrichment logic is exercised in tests without capturing console output.
// SOURCE: internal reasoning

import chalk from "chalk";
import type { WriteStream } from "tty";

export interface ProgressReporter {
  /** Report that `current` of `total` items are done; `label` names the latest item. */
  progress(current: number, total: number, label: string): void;
  /** Close the progress line once the loop ends. */
  finish(): void;
}

export type ProgressStream = Pick<WriteStream, "isTTY" | "write" | "clearLine" | "cursorTo">;

export const silentReporter: ProgressReporter = {
  progress: () => undefined,
  finish: () => undefined
};

/**
 * Console reporter that rewrites a single line on a TTY and prints one line per item otherwise.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private lineOpen = false;

  constructor(private readonly stream: ProgressStream = process.stdout) {}

  progress(current: number, total: number, label: string): void {
    const text = `${chalk.cyan(`[${current}/${total}]`)} ${label}`;
    if (this.stream.isTTY) {
      this.stream.clearLine(0);
      this.stream.cursorTo(0);
      this.stream.write(text);
      this.lineOpen = true;
      return;
    }
    this.stream.write(`${text}\n`);
  }

  finish(): void {
    if (this.lineOpen) {
      this.stream.write("\n");
      this.lineOpen = false;
    }
  }
}
