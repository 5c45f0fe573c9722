import { Router } from "express";
import { createExamSessionService } from "../../services/examSessionService";
import { sendError } from "../errors";

const router = Router();
const examSessionService = createExamSessionService();

// GET /api/exams - List exam sessions, newest first (optionally ?groupId=)
router.get("/", async (req, res) => {
  try {
    const { groupId } = req.query;
    const sessions = await examSessionService.listSessions(
      typeof groupId === "string" && groupId ? groupId : undefined
    );
    res.json(sessions);
  } catch (error) {
    sendError(res, error, "Failed to fetch exam sessions");
  }
});

// POST /api/exams - Create a draft session for a group
router.post("/", async (req, res) => {
  try {
    const { groupId } = req.body ?? {};
    if (!groupId || typeof groupId !== "string") {
      return res.status(400).json({ error: "groupId is required" });
    }

    const session = await examSessionService.createSession(groupId);
    res.status(201).json(session);
  } catch (error) {
    sendError(res, error, "Failed to create exam session");
  }
});

/**
 * POST /api/exams/:id/assignment
 *
 * Draw the session's tasks. Body may carry a numeric seed for a reproducible draw.
 * Calling it again returns the stored assignment (alreadyAssigned: true).
 */
router.post("/:id/assignment", async (req, res) => {
  try {
    const { seed } = req.body ?? {};
    if (seed !== undefined && typeof seed !== "number") {
      return res.status(400).json({ error: "seed must be a number" });
    }

    const outcome = await examSessionService.computeAssignment(req.params.id, seed);
    res.json(outcome);
  } catch (error) {
    sendError(res, error, "Failed to assign tasks");
  }
});

// GET /api/exams/:id/instructor - Full view with hints and solutions
router.get("/:id/instructor", async (req, res) => {
  try {
    const view = await examSessionService.getInstructorView(req.params.id);
    res.json(view);
  } catch (error) {
    sendError(res, error, "Failed to fetch instructor view");
  }
});

// GET /api/exams/:id/student - Redacted view, polled by the student screen
router.get("/:id/student", async (req, res) => {
  try {
    const view = await examSessionService.getStudentView(req.params.id);
    res.set("Cache-Control", "no-store");
    res.json(view);
  } catch (error) {
    sendError(res, error, "Failed to fetch student view");
  }
});

// POST /api/exams/:id/complete - Finish the exam (idempotent)
router.post("/:id/complete", async (req, res) => {
  try {
    const session = await examSessionService.completeSession(req.params.id);
    res.json(session);
  } catch (error) {
    sendError(res, error, "Failed to complete exam session");
  }
});

export default router;
