import debug from "debug";
import { execa } from "execa";
import type { CollaboratorStatus, InstallRequest, Installer } from "../types";

const log = debug("distrun:install");

/**
 * Runs the project's install command as a child process and reports its exit
 * status. Output is captured in full and also streamed to `onOutput`.
 */
export class ProcessInstaller implements Installer {
  private readonly env: Record<string, string>;

  constructor(env: Record<string, string> = {}) {
    this.env = env;
  }

  async install(request: InstallRequest): Promise<CollaboratorStatus> {
    const commandLine = [request.command, ...request.args].join(" ");
    log("Running %s in %s", commandLine, request.cwd);

    const proc = execa(request.command, request.args, {
      all: true,
      cwd: request.cwd,
      env: this.env,
      reject: false,
      stdin: "ignore",
    });

    proc.all?.on("data", (data: Buffer) => {
      request.onOutput?.(data.toString());
    });

    const result = await proc;
    log("Finished %s: failed=%s exitCode=%s", commandLine, result.failed, result.exitCode);

    if (!result.failed) {
      return { ok: true };
    }

    const output = result.all ?? "";
    if (typeof result.exitCode === "number") {
      return {
        exitCode: result.exitCode,
        message: `${commandLine} exited with code ${result.exitCode}`,
        ok: false,
        output,
      };
    }
    return {
      message: `${commandLine} could not be run`,
      ok: false,
      output,
    };
  }
}
