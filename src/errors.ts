export type ErrorCode =
  | "USAGE"
  | "UNKNOWN_TASK"
  | "CONFIG"
  | "TASK_GRAPH"
  | "INSTALL"
  | "MISSING_ARTIFACT"
  | "PACKAGING"
  | "TASK_FAILED";

const USAGE_EXIT_CODE = 2;
const FAILURE_EXIT_CODE = 1;

/**
 * Base class for every error the runner raises on purpose.
 * `task` names the task that failed, when there is one.
 */
export class DistrunError extends Error {
  readonly code: ErrorCode;
  readonly task: string | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    options: { task?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.task = options.task;
  }

  get exitStatus(): number {
    return this.code === "USAGE" ||
      this.code === "UNKNOWN_TASK" ||
      this.code === "CONFIG"
      ? USAGE_EXIT_CODE
      : FAILURE_EXIT_CODE;
  }
}

export class UsageError extends DistrunError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export class UnknownTaskError extends DistrunError {
  readonly available: readonly string[];

  constructor(task: string, available: readonly string[]) {
    super(
      "UNKNOWN_TASK",
      `Unknown task "${task}" (expected one of: ${available.join(", ")})`,
      { task }
    );
    this.available = available;
  }
}

export class ConfigError extends DistrunError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], cause?: unknown) {
    super("CONFIG", message, { cause });
    this.issues = issues;
  }
}

export class TaskGraphError extends DistrunError {
  constructor(message: string) {
    super("TASK_GRAPH", message);
  }
}

export class InstallError extends DistrunError {
  readonly exitCode: number | undefined;
  readonly output: string;

  constructor(
    task: string,
    message: string,
    exitCode: number | undefined,
    output = ""
  ) {
    super("INSTALL", `Task "${task}" failed: ${message}`, { task });
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class MissingArtifactError extends DistrunError {
  readonly artifact: string;

  constructor(task: string, artifact: string, cause?: unknown) {
    super(
      "MISSING_ARTIFACT",
      `Task "${task}" failed: manifest entry "${artifact}" does not exist`,
      { cause, task }
    );
    this.artifact = artifact;
  }
}

export class PackagingError extends DistrunError {
  constructor(task: string, message: string) {
    super("PACKAGING", `Task "${task}" failed: ${message}`, { task });
  }
}

export class TaskFailedError extends DistrunError {
  constructor(task: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("TASK_FAILED", `Task "${task}" failed: ${reason}`, { cause, task });
  }
}
