import ansis from "ansis";
import type { Config } from "../types";

type Paint = (text: string) => string;

const TASK_COLORS: readonly Paint[] = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
];

const GLYPHS = {
  fail: ansis.red("✗"),
  info: ansis.blue("ℹ"),
  success: ansis.green("✓"),
  warn: ansis.yellow("⚠"),
} as const;

type LoggerConfig = Pick<Config, "quiet" | "prefix">;

/**
 * Console output for a run. Task lines carry a coloured `[task] |` prefix
 * padded to the longest registered name; status lines carry a glyph.
 * Quiet mode drops progress output only: errors, warnings and failures
 * always print.
 */
export class Logger {
  readonly quiet: boolean;
  private readonly prefix: string | boolean;
  private readonly paints = new Map<string, Paint>();
  private width = 0;

  constructor(config: LoggerConfig = {}) {
    this.quiet = config.quiet ?? false;
    this.prefix = config.prefix ?? true;
  }

  registerTask(taskName: string): void {
    if (this.paints.has(taskName)) {
      return;
    }
    const paint = TASK_COLORS[this.paints.size % TASK_COLORS.length];
    this.paints.set(taskName, paint ?? ansis.white);
    this.width = Math.max(this.width, taskName.length);
  }

  createTaskLogger(taskName: string): TaskLogger {
    this.registerTask(taskName);
    return new TaskLogger(this, taskName);
  }

  log(taskName: string, message: string): void {
    if (!this.quiet) {
      this.writeTaskLines(taskName, message, (line) => console.log(line));
    }
  }

  error(taskName: string, message: string): void {
    this.writeTaskLines(
      taskName,
      message,
      (line) => console.error(line),
      ansis.red
    );
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(`${GLYPHS.info} ${message}`);
    }
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(`${GLYPHS.success} ${message}`);
    }
  }

  warn(message: string): void {
    console.warn(`${GLYPHS.warn} ${message}`);
  }

  fail(message: string): void {
    console.error(`${GLYPHS.fail} ${message}`);
  }

  private writeTaskLines(
    taskName: string,
    message: string,
    write: (line: string) => void,
    paintLine: Paint = (line) => line
  ): void {
    const label = this.label(taskName);
    for (const line of message.split("\n")) {
      if (line.trim() === "") {
        continue;
      }
      write(label ? `${label} ${paintLine(line)}` : paintLine(line));
    }
  }

  private label(taskName: string): string {
    if (this.prefix === false) {
      return "";
    }
    const paint = this.paints.get(taskName) ?? ansis.white;
    if (typeof this.prefix === "string") {
      return paint(this.prefix);
    }
    // width + 2 for the brackets
    return `${paint(`[${taskName}]`.padEnd(this.width + 2))} ${ansis.gray("|")}`;
  }
}

/** A {@link Logger} bound to one task's prefix. */
export class TaskLogger {
  private readonly parent: Logger;
  readonly taskName: string;

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  get quiet(): boolean {
    return this.parent.quiet;
  }

  log(message: string): void {
    this.parent.log(this.taskName, message);
  }

  error(message: string): void {
    this.parent.error(this.taskName, message);
  }
}
