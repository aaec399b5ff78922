import debug from "debug";
import type { TaskRegistry } from "../core/registry";
import { DistrunError, TaskFailedError } from "../errors";
import type { RunOptions, RunResult, TaskState } from "../types";
import { Logger } from "../utils/logger";

const log = debug("distrun:runner");

type RunState = {
  states: Map<string, TaskState>;
  executed: string[];
};

export class Runner {
  private readonly registry: TaskRegistry;
  private readonly options: RunOptions;
  private readonly logger: Logger;

  constructor(registry: TaskRegistry, options: RunOptions = {}) {
    this.registry = registry;
    this.options = options;
    this.logger = new Logger(options);

    // Register up front so prefixes line up across the whole run
    for (const name of registry.names()) {
      this.logger.registerTask(name);
    }
  }

  /**
   * Run `taskName` after its prerequisites, depth-first in declaration
   * order. Each task runs at most once per call. Unknown names are rejected
   * before anything runs.
   */
  async run(taskName: string): Promise<RunResult> {
    const target = this.registry.get(taskName);
    const run: RunState = { executed: [], states: new Map() };

    log("=== Running %s ===", target.name);
    log("Plan:", this.registry.plan(target.name));

    await this.resolve(target.name, run);

    return {
      executed: run.executed,
      states: Object.fromEntries(run.states),
      target: target.name,
    };
  }

  private async resolve(name: string, run: RunState): Promise<void> {
    if (run.states.get(name) === "done") {
      log(`Task ${name} already done in this run, skipping`);
      return;
    }

    const task = this.registry.get(name);
    try {
      this.transition(run, name, "prerequisites-running");
      for (const prerequisite of task.prerequisites) {
        await this.resolve(prerequisite, run);
      }

      this.transition(run, name, "action-running");
      if (this.options.dryRun) {
        this.logger.info(`Would run: ${name}`);
      } else {
        this.logger.info(`Running: ${name}`);
        await task.action({
          cwd: this.options.cwd ?? process.cwd(),
          logger: this.logger.createTaskLogger(name),
        });
      }
    } catch (error) {
      // A prerequisite already reported its own failure.
      if (run.states.get(name) === "action-running") {
        this.logger.fail(`Failed: ${name}`);
      }
      this.transition(run, name, "failed");
      throw error instanceof DistrunError
        ? error
        : new TaskFailedError(name, error);
    }

    this.transition(run, name, "done");
    run.executed.push(name);
    if (!this.options.dryRun) {
      this.logger.success(`Completed: ${name}`);
    }
  }

  private transition(run: RunState, name: string, state: TaskState): void {
    log(`${name}: ${run.states.get(name) ?? "not-started"} -> ${state}`);
    run.states.set(name, state);
    this.options.onTaskState?.(name, state);
  }
}
