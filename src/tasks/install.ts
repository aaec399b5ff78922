import { InstallError } from "../errors";
import type { Installer, ProjectConfig, TaskDescriptor } from "../types";

export function installTask(
  project: ProjectConfig,
  installer: Installer
): TaskDescriptor {
  return {
    action: async ({ cwd, logger }) => {
      const { command, args } = project.install;
      logger.log(`Running ${[command, ...args].join(" ")}`);

      const status = await installer.install({
        args,
        command,
        cwd,
        onOutput: (chunk) => logger.log(chunk),
      });

      if (!status.ok) {
        // Streamed output was suppressed; show what the installer said.
        if (status.output && logger.quiet) {
          logger.error(status.output);
        }
        throw new InstallError("install", status.message, status.exitCode, status.output);
      }
    },
    description: "Install the module into the active runtime",
    name: "install",
    prerequisites: ["clean"],
  };
}
