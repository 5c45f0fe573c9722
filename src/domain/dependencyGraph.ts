/**
 * Dependency Graph
 *
 * In-memory model of the catalog's "requires" and "excludes" relations.
 *
 * - requires is directed and must be acyclic (checked at build time)
 * - excludes is treated as undirected: if A excludes B, B excludes A,
 *   even when only one side records it
 */

import { Task } from "./task";
import { ConfigError, NotFoundError } from "./errors";

type VisitState = "unvisited" | "visiting" | "done";

export class DependencyGraph {
  constructor(
    private readonly tasks: Map<string, Task>,
    private readonly requiresEdges: Map<string, string[]>,
    private readonly excludesEdges: Map<string, Set<string>>
  ) {}

  hasTask(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  getTask(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError("task", taskId);
    }
    return task;
  }

  /**
   * All tasks transitively required by taskId, including taskId itself.
   * Order is depth-first discovery order, starting with taskId.
   */
  closure(taskId: string): string[] {
    if (!this.tasks.has(taskId)) {
      throw new NotFoundError("task", taskId);
    }

    const seen = new Set<string>();
    const order: string[] = [];
    const stack = [taskId];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      order.push(current);

      // Push in reverse so the first listed requirement is visited first
      const next = this.requiresEdges.get(current) ?? [];
      for (let i = next.length - 1; i >= 0; i--) {
        if (!seen.has(next[i])) stack.push(next[i]);
      }
    }

    return order;
  }

  /**
   * Tasks directly marked as excluded by taskId (one-sided, as recorded)
   */
  conflictsWith(taskId: string): Set<string> {
    return new Set(this.getTask(taskId).excludes);
  }

  /**
   * Undirected conflict check
   */
  areConflicting(a: string, b: string): boolean {
    return this.excludesEdges.get(a)?.has(b) ?? false;
  }
}

/**
 * Build the graph from the catalog.
 * Throws ConfigError on duplicate ids, unknown or self references, or a requires cycle.
 */
export function buildGraph(tasks: Task[]): DependencyGraph {
  const byId = new Map<string, Task>();
  for (const task of tasks) {
    if (byId.has(task.id)) {
      throw new ConfigError(`Duplicate task id "${task.id}" in catalog`, task.id);
    }
    byId.set(task.id, task);
  }

  const requiresEdges = new Map<string, string[]>();
  const excludesEdges = new Map<string, Set<string>>();
  for (const task of tasks) {
    excludesEdges.set(task.id, new Set());
  }

  for (const task of tasks) {
    for (const dep of task.requires) {
      checkReference(task.id, dep, "require", byId);
    }
    requiresEdges.set(task.id, [...new Set(task.requires)]);

    for (const other of task.excludes) {
      checkReference(task.id, other, "exclude", byId);
      excludesEdges.get(task.id)?.add(other);
      excludesEdges.get(other)?.add(task.id);
    }
  }

  const cycle = findRequiresCycle(tasks, requiresEdges);
  if (cycle) {
    throw new ConfigError(`Cyclic task requirements: ${cycle.join(" -> ")}`, cycle[0]);
  }

  return new DependencyGraph(byId, requiresEdges, excludesEdges);
}

function checkReference(
  taskId: string,
  referencedId: string,
  relation: "require" | "exclude",
  byId: Map<string, Task>
): void {
  if (referencedId === taskId) {
    throw new ConfigError(`Task "${taskId}" cannot ${relation} itself`, taskId);
  }
  if (!byId.has(referencedId)) {
    throw new ConfigError(
      `Task "${taskId}" ${relation}s unknown task "${referencedId}"`,
      referencedId
    );
  }
}

/**
 * Depth-first search with three-coloring. A back-edge to a node that is
 * still being visited closes a cycle; returns that cycle's path or null.
 */
export function findRequiresCycle(
  tasks: Task[],
  requiresEdges: Map<string, string[]>
): string[] | null {
  const state = new Map<string, VisitState>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    state.set(id, "visiting");
    path.push(id);

    for (const next of requiresEdges.get(id) ?? []) {
      const nextState = state.get(next) ?? "unvisited";
      if (nextState === "visiting") {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (nextState === "unvisited") {
        const found = visit(next);
        if (found) return found;
      }
    }

    path.pop();
    state.set(id, "done");
    return null;
  };

  for (const task of tasks) {
    if ((state.get(task.id) ?? "unvisited") === "unvisited") {
      const found = visit(task.id);
      if (found) return found;
    }
  }

  return null;
}
