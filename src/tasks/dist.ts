import { rm } from "node:fs/promises";
import { join } from "node:path";
import {
  archiveFileName,
  artifactSet,
  backupFileName,
} from "../core/config";
import { MissingArtifactError, PackagingError } from "../errors";
import type { Archiver, ProjectConfig, TaskDescriptor } from "../types";
import {
  copyArtifacts,
  removeDirectories,
  rotate,
  withStagingDirectory,
} from "../utils/fs";

/**
 * Stage the manifest into `<name>/` and zip it as `<name>.zip`, keeping the
 * previous archive as `<name>-old.zip`. The staging directory never
 * outlives the action.
 */
export function distTask(
  project: ProjectConfig,
  archiver: Archiver
): TaskDescriptor {
  return {
    action: async ({ cwd, logger }) => {
      const archiveName = archiveFileName(project);
      const backupName = backupFileName(project);
      const archivePath = join(cwd, archiveName);

      // Left behind by an interrupted run.
      if ((await removeDirectories(cwd, [project.name])).length > 0) {
        logger.log(`Removed stale ${project.name}/`);
      }

      if (await rotate(archivePath, join(cwd, backupName))) {
        logger.log(`Moved ${archiveName} to ${backupName}`);
      }

      await withStagingDirectory(join(cwd, project.name), async (dir) => {
        const manifest = artifactSet(project);
        const missing = await copyArtifacts(cwd, manifest, dir);
        if (missing) {
          throw new MissingArtifactError("dist", missing.entry, missing.cause);
        }
        logger.log(`Staged ${manifest.length} files`);

        const status = await archiver.archive({
          level: project.compressionLevel,
          outputPath: archivePath,
          rootName: project.name,
          sourceDir: dir,
        });
        if (!status.ok) {
          await rm(archivePath, { force: true });
          throw new PackagingError("dist", status.message);
        }
      });

      logger.log(`Created ${archiveName}`);
    },
    description: "Package the project as a zip archive",
    name: "dist",
    prerequisites: ["distclean"],
  };
}
