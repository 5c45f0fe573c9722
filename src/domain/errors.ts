/**
 * Exam Error Hierarchy
 *
 * Typed error classes for the failure modes of exam assignment.
 * Callers branch on `code`; the HTTP layer maps each class to a status.
 */

export type ExamErrorCode =
  | "CONFIG_ERROR"
  | "INSUFFICIENT_TASKS"
  | "DEPENDENCY_CONFLICT"
  | "CONCURRENCY_CONFLICT"
  | "NOT_FOUND"
  | "INVALID_SESSION_STATE";

/**
 * Base error class for all exam-related errors
 */
export abstract class ExamError extends Error {
  constructor(
    message: string,
    public readonly code: ExamErrorCode,
    public readonly recoverable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Structured details for API responses
   */
  abstract get details(): Record<string, unknown>;
}

/**
 * Catalog or quota configuration cannot be used (cycles, bad quotas, unknown references)
 */
export class ConfigError extends ExamError {
  constructor(message: string, public readonly reference?: string) {
    super(message, "CONFIG_ERROR");
  }

  get details(): Record<string, unknown> {
    return this.reference ? { reference: this.reference } : {};
  }
}

/**
 * A category's eligible pool is smaller than its quota
 */
export class InsufficientTasksError extends ExamError {
  constructor(
    public readonly categoryId: string,
    public readonly categoryName: string,
    public readonly required: number,
    public readonly available: number
  ) {
    super(
      `Not enough tasks in category "${categoryName}": required ${required}, available ${available}`,
      "INSUFFICIENT_TASKS"
    );
  }

  get details(): Record<string, unknown> {
    return {
      categoryId: this.categoryId,
      category: this.categoryName,
      required: this.required,
      available: this.available,
    };
  }
}

/**
 * Two tasks that exclude each other would end up in the same session
 */
export class DependencyConflictError extends ExamError {
  constructor(
    public readonly taskId: string,
    public readonly conflictingTaskId: string
  ) {
    super(
      `Task "${taskId}" conflicts with task "${conflictingTaskId}"`,
      "DEPENDENCY_CONFLICT"
    );
  }

  get details(): Record<string, unknown> {
    return { taskId: this.taskId, conflictingTaskId: this.conflictingTaskId };
  }
}

/**
 * Another assignment attempt for the same session overlapped with this one.
 * Retry, or fetch the session which is most likely active by now.
 */
export class ConcurrencyError extends ExamError {
  constructor(public readonly sessionId: string, reason: string) {
    super(`Concurrent assignment for session "${sessionId}": ${reason}`, "CONCURRENCY_CONFLICT", true);
  }

  get details(): Record<string, unknown> {
    return { sessionId: this.sessionId };
  }
}

export type NotFoundEntity = "session" | "task" | "group" | "category";

/**
 * Reference to an unknown session, task, group or category
 */
export class NotFoundError extends ExamError {
  constructor(public readonly entity: NotFoundEntity, public readonly id: string) {
    super(`Unknown ${entity} "${id}"`, "NOT_FOUND");
  }

  get details(): Record<string, unknown> {
    return { entity: this.entity, id: this.id };
  }
}

/**
 * The requested transition is not allowed from the session's current status
 */
export class SessionStateError extends ExamError {
  constructor(
    public readonly sessionId: string,
    public readonly status: string,
    action: string
  ) {
    super(`Cannot ${action} session "${sessionId}" while it is ${status}`, "INVALID_SESSION_STATE");
  }

  get details(): Record<string, unknown> {
    return { sessionId: this.sessionId, status: this.status };
  }
}

export function isExamError(error: unknown): error is ExamError {
  return error instanceof ExamError;
}
