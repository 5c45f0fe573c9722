import { Response } from "express";
import { ExamError, ExamErrorCode, isExamError } from "../domain/errors";

const STATUS_BY_CODE: Record<ExamErrorCode, number> = {
  NOT_FOUND: 404,
  CONFIG_ERROR: 400,
  INSUFFICIENT_TASKS: 400,
  DEPENDENCY_CONFLICT: 400,
  CONCURRENCY_CONFLICT: 409,
  INVALID_SESSION_STATE: 409,
};

export function httpStatusFor(error: ExamError): number {
  return STATUS_BY_CODE[error.code];
}

/**
 * Send an error response. Exam errors are reported verbatim with their
 * details; anything else is logged and hidden behind a generic message.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (isExamError(error)) {
    res.status(httpStatusFor(error)).json({
      error: error.message,
      code: error.code,
      details: error.details,
    });
    return;
  }

  console.error(`[API] ${fallbackMessage}:`, error);
  res.status(500).json({ error: fallbackMessage });
}
