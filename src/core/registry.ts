import debug from "debug";
import graphlib from "graphlib";
import { TaskGraphError, UnknownTaskError } from "../errors";
import type { TaskDescriptor } from "../types";

const { Graph, alg } = graphlib;

const log = debug("distrun:registry");

/**
 * Immutable set of task descriptors, validated once at construction.
 *
 * Edges go from a task to each of its prerequisites, so a cycle in the
 * graph is a task that (transitively) requires itself.
 */
export class TaskRegistry {
  private readonly tasks: ReadonlyMap<string, TaskDescriptor>;

  constructor(descriptors: readonly TaskDescriptor[]) {
    const tasks = new Map<string, TaskDescriptor>();
    for (const descriptor of descriptors) {
      if (!descriptor.name.trim()) {
        throw new TaskGraphError("Task names must not be empty");
      }
      if (tasks.has(descriptor.name)) {
        throw new TaskGraphError(`Duplicate task "${descriptor.name}"`);
      }
      tasks.set(
        descriptor.name,
        Object.freeze({
          ...descriptor,
          prerequisites: Object.freeze([...descriptor.prerequisites]),
        })
      );
    }

    const graph = new Graph();
    for (const name of tasks.keys()) {
      graph.setNode(name);
    }
    for (const task of tasks.values()) {
      for (const prerequisite of task.prerequisites) {
        if (!tasks.has(prerequisite)) {
          throw new TaskGraphError(
            `Task "${task.name}" requires unknown task "${prerequisite}"`
          );
        }
        graph.setEdge(task.name, prerequisite);
      }
    }

    if (!alg.isAcyclic(graph)) {
      const cycles = alg.findCycles(graph);
      throw new TaskGraphError(
        `Circular dependency detected: ${JSON.stringify(cycles)}`
      );
    }

    log("Registered tasks:", graph.nodes());
    log("Edges:", graph.edges());

    this.tasks = tasks;
    Object.freeze(this);
  }

  names(): string[] {
    return [...this.tasks.keys()];
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  get(name: string): TaskDescriptor {
    const task = this.tasks.get(name);
    if (!task) {
      throw new UnknownTaskError(name, this.names());
    }
    return task;
  }

  /**
   * Execution order for a target: prerequisites depth-first in declaration
   * order, each task once, target last.
   */
  plan(target: string): string[] {
    const order: string[] = [];
    const visit = (name: string): void => {
      if (order.includes(name)) {
        return;
      }
      for (const prerequisite of this.get(name).prerequisites) {
        visit(prerequisite);
      }
      order.push(name);
    };
    visit(target);
    return order;
  }
}
