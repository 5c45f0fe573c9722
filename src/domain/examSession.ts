/**
 * Exam Session Domain Model
 *
 * An ExamSession is one sitting of a group. Its lifecycle:
 *
 *   draft ──(assignment drawn)──▶ active ──(instructor completes)──▶ completed
 *
 * - draft: created by the instructor, no tasks yet
 * - active: tasks drawn and fixed; the assigned list is never rewritten
 * - completed: terminal; completing again is a no-op
 *
 * Transitions are pure functions returning a new record; persistence is the
 * store's job.
 */

import { AssignmentResult } from "./assignmentEngine";
import { SessionStateError } from "./errors";

export type ExamSessionStatus = "draft" | "active" | "completed";

export interface ExamSession {
  id: string;
  groupId: string;
  status: ExamSessionStatus;
  seed: number | null; // Seed the draw used, null until active
  assignedTaskIds: string[]; // Ordered: by category, then selection order
  dependencyTaskIds: string[]; // Subset of assignedTaskIds added only as dependencies
  createdAt: string;
  activatedAt?: string;
  completedAt?: string;
}

export const SESSION_STATUS_LABELS: Record<ExamSessionStatus, string> = {
  draft: "Waiting for tasks",
  active: "In progress",
  completed: "Completed",
};

export function createDraftSession(id: string, groupId: string, now: Date): ExamSession {
  return {
    id,
    groupId,
    status: "draft",
    seed: null,
    assignedTaskIds: [],
    dependencyTaskIds: [],
    createdAt: now.toISOString(),
  };
}

/**
 * Whether the session has a fixed assignment (active or completed)
 */
export function isAssigned(session: ExamSession): boolean {
  return session.status !== "draft";
}

/**
 * draft → active. Stores the drawn list and the seed that produced it.
 */
export function activateSession(
  session: ExamSession,
  result: AssignmentResult,
  seed: number,
  now: Date
): ExamSession {
  if (session.status !== "draft") {
    throw new SessionStateError(session.id, session.status, "assign tasks to");
  }

  return {
    ...session,
    status: "active",
    seed,
    assignedTaskIds: result.entries.map((e) => e.taskId),
    dependencyTaskIds: result.entries.filter((e) => e.role === "dependency").map((e) => e.taskId),
    activatedAt: now.toISOString(),
  };
}

/**
 * active → completed. Completing a completed session returns it unchanged.
 */
export function completeSession(session: ExamSession, now: Date): ExamSession {
  if (session.status === "completed") {
    return session;
  }
  if (session.status === "draft") {
    throw new SessionStateError(session.id, session.status, "complete");
  }

  return {
    ...session,
    status: "completed",
    completedAt: now.toISOString(),
  };
}
