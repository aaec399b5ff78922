import { UsageError } from "../errors";
import type { ParsedCommand } from "../types";
import { Logger } from "../utils/logger";

const END_OF_FLAGS = "--";

export class Parser {
  private readonly logger: Logger;

  constructor(logger: Logger = new Logger()) {
    this.logger = logger;
  }

  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      config: {},
      extraTasks: [],
      help: false,
    };

    let flagsEnded = false;
    for (const arg of args) {
      if (flagsEnded) {
        this.processPositional(arg, result);
      } else if (arg === END_OF_FLAGS) {
        flagsEnded = true;
      } else if (arg.startsWith("--")) {
        this.processLongFlag(arg.substring(2), result);
      } else if (arg.startsWith("-") && arg.length > 1) {
        this.processShortFlags(arg.substring(1), result);
      } else {
        this.processPositional(arg, result);
      }
    }

    return result;
  }

  private processPositional(arg: string, result: ParsedCommand): void {
    if (result.task === undefined) {
      result.task = arg;
    } else {
      result.extraTasks.push(arg);
    }
  }

  private processLongFlag(flag: string, result: ParsedCommand): void {
    if (flag === "quiet") {
      result.config.quiet = true;
    } else if (flag === "dry-run") {
      result.config.dryRun = true;
    } else if (flag === "help") {
      result.help = true;
    } else if (flag === "no-prefix") {
      result.config.prefix = false;
    } else if (flag.startsWith("prefix=")) {
      result.config.prefix = flag.substring("prefix=".length);
    } else if (flag === "config" || flag.startsWith("config=")) {
      const value = flag.substring("config=".length);
      if (!value) {
        throw new UsageError("--config requires a path: --config=<path>");
      }
      result.configPath = value;
    } else {
      this.logger.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: ParsedCommand): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "n") {
        result.config.dryRun = true;
      } else if (flag === "h") {
        result.help = true;
      } else {
        this.logger.warn(`Unknown flag: -${flag}`);
      }
    }
  }
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}
