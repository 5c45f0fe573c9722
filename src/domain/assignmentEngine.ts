/**
 * Assignment Engine
 *
 * Draws the task set for one exam session:
 * - every category contributes exactly `quota` of its own tasks (quota picks)
 * - every pick brings its full requires-closure (dependency additions,
 *   which count against no quota)
 * - no two drawn tasks exclude each other
 *
 * Categories are processed in ascending id order so that a fixed seed and
 * catalog snapshot always give the same result.
 */

import { Category, isValidQuota } from "./category";
import { Task } from "./task";
import { DependencyGraph } from "./dependencyGraph";
import { RandomSource, sampleWithoutReplacement } from "./randomSource";
import { ConfigError, DependencyConflictError, InsufficientTasksError } from "./errors";

// ============================================
// Types
// ============================================

export type AssignmentRole = "quota" | "dependency";

export interface AssignedEntry {
  taskId: string;
  categoryId: string; // The task's own category
  role: AssignmentRole;
  triggeredBy?: string; // For dependencies: the quota pick whose closure added it
}

export interface AssignmentInput {
  categories: Category[];
  tasksByCategory: Map<string, Task[]>;
  graph: DependencyGraph;
  random: RandomSource;
}

export interface AssignmentResult {
  entries: AssignedEntry[];
}

// ============================================
// Drawing
// ============================================

export function drawAssignment(input: AssignmentInput): AssignmentResult {
  const { graph, random, tasksByCategory } = input;
  const categories = validateInput(input);

  const selected = new Set<string>();
  const entries: AssignedEntry[] = [];

  for (const category of categories) {
    const ownTasks = tasksByCategory.get(category.id) ?? [];

    // 1. Eligible pool
    const pool = ownTasks.filter(
      (task) =>
        !selected.has(task.id) &&
        graph.closure(task.id).every((member) => !conflictsWithAny(graph, member, selected))
    );

    // 2. Shortfall is a hard error, never a reduced quota
    if (pool.length < category.quota) {
      throw new InsufficientTasksError(category.id, category.name, category.quota, pool.length);
    }

    // 3. Sample
    const picks = sampleWithoutReplacement(pool, category.quota, random);

    // 4. Expand closures, checking each new member against everything selected or pending
    const pending = new Set<string>();
    const quotaEntries: AssignedEntry[] = [];
    let dependencyEntries: AssignedEntry[] = [];

    for (const pick of picks) {
      for (const member of graph.closure(pick.id)) {
        if (selected.has(member)) continue;

        if (pending.has(member)) {
          // An earlier pick already pulled this task in; it now also fills the quota
          if (member === pick.id) {
            dependencyEntries = dependencyEntries.filter((e) => e.taskId !== member);
            quotaEntries.push({ taskId: member, categoryId: category.id, role: "quota" });
          }
          continue;
        }

        const conflict = findConflict(graph, member, selected, pending);
        if (conflict !== null) {
          throw new DependencyConflictError(member, conflict);
        }
        pending.add(member);

        if (member === pick.id) {
          quotaEntries.push({ taskId: member, categoryId: category.id, role: "quota" });
        } else {
          dependencyEntries.push({
            taskId: member,
            categoryId: graph.getTask(member).categoryId,
            role: "dependency",
            triggeredBy: pick.id,
          });
        }
      }
    }

    for (const id of pending) selected.add(id);
    entries.push(...quotaEntries, ...dependencyEntries);
  }

  return { entries };
}

/**
 * Count quota picks per category
 */
export function countQuotaPicks(entries: AssignedEntry[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const entry of entries) {
    if (entry.role === "quota") {
      counts.set(entry.categoryId, (counts.get(entry.categoryId) ?? 0) + 1);
    }
  }
  return counts;
}

// ============================================
// Helpers
// ============================================

/**
 * Reject anything the draw cannot interpret. Returns categories in iteration order.
 */
function validateInput({ categories, tasksByCategory, graph }: AssignmentInput): Category[] {
  const known = new Set<string>();
  for (const category of categories) {
    if (known.has(category.id)) {
      throw new ConfigError(`Duplicate category id "${category.id}"`, category.id);
    }
    if (!isValidQuota(category.quota)) {
      throw new ConfigError(
        `Invalid quota ${String(category.quota)} for category "${category.name}"`,
        category.id
      );
    }
    known.add(category.id);
  }

  for (const [categoryId, tasks] of tasksByCategory) {
    if (!known.has(categoryId)) {
      throw new ConfigError(`Category "${categoryId}" has tasks but no configured quota`, categoryId);
    }
    for (const task of tasks) {
      if (!graph.hasTask(task.id)) {
        throw new ConfigError(`Task "${task.id}" is missing from the dependency graph`, task.id);
      }
      if (task.categoryId !== categoryId) {
        throw new ConfigError(
          `Task "${task.id}" is listed under "${categoryId}" but belongs to "${task.categoryId}"`,
          task.id
        );
      }
    }
  }

  return [...categories].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

function conflictsWithAny(graph: DependencyGraph, taskId: string, others: Set<string>): boolean {
  for (const other of others) {
    if (graph.areConflicting(taskId, other)) return true;
  }
  return false;
}

function findConflict(
  graph: DependencyGraph,
  taskId: string,
  selected: Set<string>,
  pending: Set<string>
): string | null {
  for (const other of selected) {
    if (graph.areConflicting(taskId, other)) return other;
  }
  for (const other of pending) {
    if (graph.areConflicting(taskId, other)) return other;
  }
  return null;
}
