import chalk from "chalk";
import ora, { Ora } from "ora";
import { TransferProgress } from "../types";
import { formatDuration } from "../utils/time";

/**
 * Terminal output manager (Singleton)
 * - Progress stays on one line (spinner updates in place)
 * - Task lines scroll below the spinner (max-lines)
 * - Background colors for section headers
 */
export class Output {
  private static instance: Output | null = null;
  private spinner: Ora | null = null;
  private taskStartTime: number | null = null;
  private taskOriginalMessage: string | null = null;
  private taskCurrentMessage: string | null = null;
  private taskLines: string[] = [];
  private taskMaxLines: number = 0; // 0 = unlimited

  private constructor() {}

  /**
   * Get the singleton instance
   */
  static getInstance(): Output {
    if (!Output.instance) {
      Output.instance = new Output();
    }
    return Output.instance;
  }

  /**
   * Start a task with spinner - updates in place
   * Completes any previous task before starting the new one
   */
  task(message: string, maxLines: number = 0): void {
    if (this.spinner) {
      this.done();
    }

    this.taskStartTime = Date.now();
    this.taskOriginalMessage = message;
    this.taskCurrentMessage = message;
    this.taskMaxLines = maxLines;
    this.taskLines = [];
    this.spinner = ora(message).start();
  }

  /**
   * Update spinner text (stays on same line)
   */
  update(message: string): void {
    if (this.spinner) {
      this.taskCurrentMessage = message;
      this.#updateTaskDisplay();
    }
  }

  /**
   * Show live transfer progress on the spinner line
   */
  transfer(label: string, progress: TransferProgress): void {
    const amount =
      progress.fraction !== undefined
        ? `${Math.floor(progress.fraction * 100)}%`
        : formatBytes(progress.bytes);
    this.update(`${label} ${chalk.dim(amount)}`);
  }

  /**
   * Add a line to the active task (appears below spinner, scrolls if max-lines set)
   * If no task is active, displays as a regular log message
   */
  taskLine(message: string, keepOnComplete: boolean = false): void {
    if (!this.spinner) {
      this.info(message);
      return;
    }

    this.taskLines.push(keepOnComplete ? `[keep]${message}` : message);

    if (this.taskMaxLines > 0 && this.taskLines.length > this.taskMaxLines) {
      this.taskLines = this.taskLines.slice(-this.taskMaxLines);
    }

    this.#updateTaskDisplay();
  }

  #updateTaskDisplay(): void {
    if (!this.spinner) return;

    const currentText =
      this.taskCurrentMessage || this.spinner.text.split("\n")[0] || "";

    if (this.taskLines.length === 0) {
      this.spinner.text = currentText;
      return;
    }

    const taskLinesText = this.taskLines
      .map((line) => {
        const cleanLine = line.startsWith("[keep]") ? line.slice(6) : line;
        return chalk.dim(`  ${cleanLine}`);
      })
      .join("\n");

    this.spinner.text = `${currentText}\n${taskLinesText}`;
  }

  /**
   * Complete task with optional duration display
   * Task lines marked with keepOnComplete are printed after the spinner
   */
  done(message?: string, showTime: boolean = true): void {
    if (!this.spinner) return;

    let text = message || this.taskOriginalMessage || "done";
    if (showTime && this.taskStartTime) {
      text += chalk.dim(` (${formatDuration(Date.now() - this.taskStartTime)})`);
    }

    this.spinner.text = text;
    this.spinner.succeed();
    this.spinner = null;

    const keptLines = this.taskLines.filter((line) =>
      line.startsWith("[keep]")
    );
    for (const line of keptLines) {
      console.log(chalk.dim(`  ${line.slice(6)}`));
    }

    this.taskStartTime = null;
    this.taskOriginalMessage = null;
    this.taskCurrentMessage = null;
    this.taskLines = [];
    this.taskMaxLines = 0;
  }

  /**
   * Show an object as a table of key-value pairs, skipping undefined values
   */
  obj(obj: Record<string, string | number | boolean | undefined>): void {
    this.#stopTask();

    const entries = Object.entries(obj).filter(
      (entry): entry is [string, string | number | boolean] =>
        entry[1] !== undefined
    );
    const maxKeyLength = Math.max(0, ...entries.map(([key]) => key.length));

    for (const [key, value] of entries) {
      console.log(`${chalk.dim(key.padEnd(maxKeyLength + 2))}${String(value)}`);
    }
  }

  /**
   * Show plain message
   */
  log(message: string): void {
    this.#stopTask();
    console.log(message);
  }

  success(message: string): void {
    this.#stopTask();
    console.log(chalk.green(message));
  }

  successBlock(label: string, message: string = ""): void {
    this.#stopTask();
    console.log(
      `\n${chalk.bgGreen.black(` ${label} `)}${message && ` ${message}`}`
    );
  }

  info(message: string): void {
    this.#stopTask();
    console.log(chalk.dim(message));
  }

  /**
   * Show error message (red text) - fails spinner if running
   */
  error(message: unknown): void {
    this.#failTask();
    console.log(
      chalk.red(
        message instanceof Error
          ? message.message
          : message instanceof Object
          ? JSON.stringify(message)
          : String(message)
      )
    );
  }

  errorBlock(label: string, message: string = ""): void {
    this.#failTask();
    console.log(
      `\n${chalk.bgRed.white(` ${label} `)}${message && ` ${message}`}`
    );
  }

  warn(message: string): void {
    this.#stopTask();
    console.log(chalk.yellow(message));
  }

  warnBlock(label: string, message: string = ""): void {
    this.#stopTask();
    console.log(
      `\n${chalk.bgYellow.black(` ${label} `)}${message && ` ${message}`}`
    );
  }

  /**
   * Show error name, message and stack trace, then exit
   */
  crash(error: unknown, exitCode: number = 1): never {
    this.#failTask();

    if (error instanceof Error) {
      console.log(chalk.red(`${error.name}: ${error.message}`));

      if (error.stack) {
        console.log("");
        console.log(chalk.dim("Stack trace:"));
        error.stack
          .split("\n")
          .slice(1)
          .forEach((line) => console.log(chalk.dim(`  ${line.trim()}`)));
      }
    } else {
      console.log(chalk.red(String(error)));
    }

    process.exit(exitCode);
  }

  exit(code?: number): never {
    this.#stopTask();
    process.exit(code || 0);
  }

  #failTask(): void {
    if (this.spinner) {
      this.spinner.fail("failed");
      this.spinner = null;
    }
    this.taskStartTime = null;
    this.taskOriginalMessage = null;
    this.taskCurrentMessage = null;
    this.taskLines = [];
  }

  /**
   * Stop spinner without showing result
   */
  #stopTask(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner.clear();
      this.spinner = null;
    }
    this.taskStartTime = null;
    this.taskOriginalMessage = null;
    this.taskCurrentMessage = null;
    this.taskLines = [];
    this.taskMaxLines = 0;
  }
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Global singleton output instance
 */
export const out: Output = Output.getInstance();
