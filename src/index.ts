export { Runner } from "./execution/runner";
export { runCommand, formatHelp } from "./execution/command";
export { Parser, parseCommand } from "./core/parser";
export { TaskRegistry } from "./core/registry";
export {
  CONFIG_FILE_NAME,
  ProjectConfigSchema,
  archiveFileName,
  artifactSet,
  backupFileName,
  loadProjectConfig,
  parseProjectConfig,
} from "./core/config";
export {
  cleanTask,
  createDefaultRegistry,
  createDefaultTasks,
  distTask,
  distcleanTask,
  installTask,
} from "./tasks";
export { ProcessInstaller } from "./collaborators/installer";
export { ZipArchiver } from "./collaborators/archiver";
export {
  copyArtifacts,
  removeDirectories,
  removeMatching,
  rotate,
  withStagingDirectory,
} from "./utils/fs";
export { Logger, TaskLogger } from "./utils/logger";
export {
  ConfigError,
  DistrunError,
  InstallError,
  MissingArtifactError,
  PackagingError,
  TaskFailedError,
  TaskGraphError,
  UnknownTaskError,
  UsageError,
} from "./errors";

export type {
  ArchiveRequest,
  Archiver,
  CollaboratorStatus,
  Config,
  InstallRequest,
  Installer,
  ParsedCommand,
  ProjectConfig,
  RunOptions,
  RunResult,
  TaskContext,
  TaskDescriptor,
  TaskState,
} from "./types";
export type { Collaborators } from "./tasks";
export type { ErrorCode } from "./errors";
export type { ProjectConfigInput } from "./core/config";
export type { CommandOptions } from "./execution/command";
