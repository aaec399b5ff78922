import type { ProjectConfig, TaskDescriptor } from "../types";
import { removeMatching } from "../utils/fs";

export function cleanTask(project: ProjectConfig): TaskDescriptor {
  return {
    action: async ({ cwd, logger }) => {
      const removed = await removeMatching(cwd, project.clean.patterns);
      if (removed.length === 0) {
        logger.log("Nothing to clean");
        return;
      }
      logger.log(`Removed ${removed.join(", ")}`);
    },
    description: "Remove editor and backup files",
    name: "clean",
    prerequisites: [],
  };
}
