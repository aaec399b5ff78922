import type { ProjectConfig, TaskDescriptor } from "../types";
import { removeDirectories, removeMatching } from "../utils/fs";

export function distcleanTask(project: ProjectConfig): TaskDescriptor {
  return {
    action: async ({ cwd, logger }) => {
      const directories = await removeDirectories(
        cwd,
        project.distclean.directories
      );
      const files = await removeMatching(cwd, project.distclean.patterns);

      const removed = [...directories.map((d) => `${d}/`), ...files];
      logger.log(
        removed.length === 0
          ? "No build outputs to remove"
          : `Removed ${removed.join(", ")}`
      );
    },
    description: "Remove build outputs and compiled artifacts",
    name: "distclean",
    prerequisites: ["clean"],
  };
}
