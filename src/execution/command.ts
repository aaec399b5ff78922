import ansis from "ansis";
import { loadProjectConfig, parseProjectConfig } from "../core/config";
import { parseCommand } from "../core/parser";
import type { TaskRegistry } from "../core/registry";
import { DistrunError, UnknownTaskError, UsageError } from "../errors";
import { type Collaborators, createDefaultRegistry } from "../tasks";
import { Runner } from "./runner";

export type CommandOptions = {
  cwd?: string;
  collaborators?: Collaborators;
};

export function formatHelp(registry: TaskRegistry): string {
  const names = registry.names();
  const width = Math.max(...names.map((n) => n.length));
  const tasks = names
    .map((name) => {
      const task = registry.get(name);
      const requires =
        task.prerequisites.length > 0
          ? ansis.gray(` (after ${task.prerequisites.join(", ")})`)
          : "";
      return `  ${name.padEnd(width)}  ${task.description ?? ""}${requires}`;
    })
    .join("\n");

  return `
${ansis.bold("distrun")} - build, install and package a single-module project

${ansis.bold("Usage:")}
  distrun <task> [flags]

${ansis.bold("Tasks:")}
${tasks}

${ansis.bold("Flags:")}
  -q, --quiet           Suppress progress output
  -n, --dry-run         Show what would run without running it
  --no-prefix           Disable output prefixes
  --prefix=<str>        Custom prefix
  --config=<path>       Project config file (default: distrun.config.json)
  -h, --help            Show this help
`;
}

/**
 * Parse `args`, run the selected task and return the process exit code.
 * Errors outside the runner's own taxonomy propagate.
 */
export async function runCommand(
  args: string[],
  options: CommandOptions = {}
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();

  try {
    const parsed = parseCommand(args);

    // Task names are fixed, so they can be checked before the config loads.
    const defaults = createDefaultRegistry(
      parseProjectConfig({}),
      options.collaborators
    );

    if (parsed.help) {
      console.log(formatHelp(defaults));
      return 0;
    }

    if (parsed.task === undefined) {
      throw new UsageError("Missing task name");
    }
    if (parsed.extraTasks.length > 0) {
      throw new UsageError(
        `Expected a single task name, got: ${[parsed.task, ...parsed.extraTasks].join(" ")}`
      );
    }

    if (!defaults.has(parsed.task)) {
      throw new UnknownTaskError(parsed.task, defaults.names());
    }

    const project = loadProjectConfig(cwd, parsed.configPath);
    const registry = createDefaultRegistry(project, options.collaborators);
    const runner = new Runner(registry, { ...parsed.config, cwd });

    await runner.run(parsed.task);
    return 0;
  } catch (error) {
    if (!(error instanceof DistrunError)) {
      throw error;
    }
    console.error(ansis.red("Error:"), error.message);
    if (error.code === "USAGE" || error.code === "UNKNOWN_TASK") {
      console.error("Usage: distrun <task> [flags]  (see distrun --help)");
    }
    return error.exitStatus;
  }
}
