/**
 * Exam Views
 *
 * Projects a session into the two client-facing shapes:
 * - Instructor: every field, including hints and solutions
 * - Student: prompt only, safe to poll
 *
 * PRIVACY: the student projection is built field by field. Hint and solution
 * are never copied, so new Task fields stay instructor-only by default.
 */

import { Category } from "./category";
import { Group } from "./group";
import { Task } from "./task";
import { AssignmentRole } from "./assignmentEngine";
import { ExamSession, ExamSessionStatus, SESSION_STATUS_LABELS } from "./examSession";
import { NotFoundError } from "./errors";

// ============================================
// Types
// ============================================

export interface InstructorTaskView {
  position: number; // 1-based
  taskId: string;
  title: string;
  categoryId: string;
  categoryName: string;
  subcategory?: string;
  prompt: string;
  images?: string[];
  hint?: string;
  solution?: string;
  role: AssignmentRole;
}

export interface PendingInstructorView {
  kind: "pending";
  sessionId: string;
  status: ExamSessionStatus;
  group?: Group;
}

export interface AssignedInstructorView {
  kind: "assigned";
  sessionId: string;
  status: ExamSessionStatus;
  seed: number | null;
  createdAt: string;
  activatedAt?: string;
  completedAt?: string;
  group?: Group;
  tasks: InstructorTaskView[];
}

export type InstructorView = PendingInstructorView | AssignedInstructorView;

export interface StudentTaskView {
  position: number;
  taskId: string;
  title: string;
  categoryName: string;
  subcategory?: string;
  prompt: string;
  images?: string[];
}

export interface StudentView {
  sessionId: string;
  status: ExamSessionStatus;
  statusLabel: string;
  ready: boolean; // False while draft: "nothing yet"
  pollIntervalMs: number;
  tasks: StudentTaskView[];
}

// ============================================
// Projections
// ============================================

export function projectInstructorView(
  session: ExamSession,
  tasks: Map<string, Task>,
  categories: Map<string, Category>,
  group?: Group
): InstructorView {
  if (session.status === "draft") {
    return { kind: "pending", sessionId: session.id, status: session.status, group };
  }

  const dependencyIds = new Set(session.dependencyTaskIds);

  return {
    kind: "assigned",
    sessionId: session.id,
    status: session.status,
    seed: session.seed,
    createdAt: session.createdAt,
    activatedAt: session.activatedAt,
    completedAt: session.completedAt,
    group,
    tasks: session.assignedTaskIds.map((taskId, index) => {
      const task = resolveTask(tasks, taskId);
      return {
        position: index + 1,
        taskId: task.id,
        title: task.title,
        categoryId: task.categoryId,
        categoryName: categoryName(categories, task.categoryId),
        subcategory: task.subcategory,
        prompt: task.prompt,
        images: task.images,
        hint: task.hint,
        solution: task.solution,
        role: dependencyIds.has(task.id) ? "dependency" : "quota",
      };
    }),
  };
}

export function projectStudentView(
  session: ExamSession,
  tasks: Map<string, Task>,
  categories: Map<string, Category>,
  pollIntervalMs: number
): StudentView {
  const ready = session.status !== "draft";

  return {
    sessionId: session.id,
    status: session.status,
    statusLabel: SESSION_STATUS_LABELS[session.status],
    ready,
    pollIntervalMs,
    tasks: ready
      ? session.assignedTaskIds.map((taskId, index) => {
          const task = resolveTask(tasks, taskId);
          return {
            position: index + 1,
            taskId: task.id,
            title: task.title,
            categoryName: categoryName(categories, task.categoryId),
            subcategory: task.subcategory,
            prompt: task.prompt,
            images: task.images,
          };
        })
      : [],
  };
}

function resolveTask(tasks: Map<string, Task>, taskId: string): Task {
  const task = tasks.get(taskId);
  if (!task) {
    throw new NotFoundError("task", taskId);
  }
  return task;
}

function categoryName(categories: Map<string, Category>, categoryId: string): string {
  const category = categories.get(categoryId);
  if (!category) {
    throw new NotFoundError("category", categoryId);
  }
  return category.name;
}
