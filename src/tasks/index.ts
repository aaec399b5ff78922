import { ZipArchiver } from "../collaborators/archiver";
import { ProcessInstaller } from "../collaborators/installer";
import { TaskRegistry } from "../core/registry";
import type {
  Archiver,
  Installer,
  ProjectConfig,
  TaskDescriptor,
} from "../types";
import { cleanTask } from "./clean";
import { distTask } from "./dist";
import { distcleanTask } from "./distclean";
import { installTask } from "./install";

export type Collaborators = {
  installer?: Installer;
  archiver?: Archiver;
};

/**
 * The four fixed tasks, each listed after everything it requires.
 */
export function createDefaultTasks(
  project: ProjectConfig,
  collaborators: Collaborators = {}
): TaskDescriptor[] {
  return [
    cleanTask(project),
    installTask(project, collaborators.installer ?? new ProcessInstaller()),
    distcleanTask(project),
    distTask(project, collaborators.archiver ?? new ZipArchiver()),
  ];
}

export function createDefaultRegistry(
  project: ProjectConfig,
  collaborators: Collaborators = {}
): TaskRegistry {
  return new TaskRegistry(createDefaultTasks(project, collaborators));
}

export { cleanTask, distTask, distcleanTask, installTask };
