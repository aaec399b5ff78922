import type { TaskLogger } from "./utils/logger";

export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
  dryRun?: boolean;
};

export type ParsedCommand = {
  task?: string;
  extraTasks: string[];
  config: Config;
  configPath?: string;
  help: boolean;
};

export type TaskState =
  | "not-started"
  | "prerequisites-running"
  | "action-running"
  | "done"
  | "failed";

export type TaskContext = {
  cwd: string;
  logger: TaskLogger;
};

export type TaskDescriptor = {
  name: string;
  description?: string;
  prerequisites: readonly string[];
  action: (context: TaskContext) => Promise<void>;
};

export type RunResult = {
  target: string;
  executed: string[];
  states: Record<string, TaskState>;
};

export interface RunOptions extends Config {
  cwd?: string;
  onTaskState?: (task: string, state: TaskState) => void;
}

export type ProjectConfig = {
  name: string;
  sources: string[];
  extras: string[];
  clean: {
    patterns: string[];
  };
  distclean: {
    directories: string[];
    patterns: string[];
  };
  install: {
    command: string;
    args: string[];
  };
  compressionLevel: number;
};

export type CollaboratorStatus =
  | { ok: true }
  | { ok: false; message: string; exitCode?: number; output?: string };

export type InstallRequest = {
  cwd: string;
  command: string;
  args: readonly string[];
  onOutput?: (chunk: string) => void;
};

export interface Installer {
  install(request: InstallRequest): Promise<CollaboratorStatus>;
}

export type ArchiveRequest = {
  sourceDir: string;
  outputPath: string;
  rootName: string;
  level: number;
};

export interface Archiver {
  archive(request: ArchiveRequest): Promise<CollaboratorStatus>;
}
