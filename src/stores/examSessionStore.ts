import fs from "fs";
import path from "path";
import { ExamSession } from "../domain/examSession";
import { NotFoundError } from "../domain/errors";
import { config } from "../config";

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

/**
 * ExamSessionStore handles saving and loading exam sessions to/from JSON files.
 * Each session is saved as a separate file: exam-sessions/{sessionId}.json
 *
 * Writes go through a temp file and a rename so a reader never sees half a session.
 */
export class ExamSessionStore {
  private readonly dir: string;

  constructor(dataDir: string = config.dataDir) {
    this.dir = path.join(dataDir, "exam-sessions");
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  /**
   * Save a session to disk
   */
  save(session: ExamSession): void {
    const filePath = this.filePath(session.id);
    const tempPath = `${filePath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(session, null, 2));
    fs.renameSync(tempPath, filePath);
  }

  /**
   * Load a session by ID
   */
  load(sessionId: string): ExamSession | null {
    const filePath = this.filePath(sessionId);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const data = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(data) as ExamSession;
  }

  /**
   * Get all sessions, newest first
   */
  getAll(): ExamSession[] {
    if (!fs.existsSync(this.dir)) {
      return [];
    }

    const sessions: ExamSession[] = [];
    for (const file of fs.readdirSync(this.dir).filter((f) => f.endsWith(".json"))) {
      try {
        const data = fs.readFileSync(path.join(this.dir, file), "utf-8");
        sessions.push(JSON.parse(data) as ExamSession);
      } catch (err) {
        console.error(`Skipping unreadable exam session file ${file}:`, err);
      }
    }

    return sessions.sort(
      (a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime()
    );
  }

  private filePath(sessionId: string): string {
    // Session ids become file names; no other alphabet can name a stored session
    if (!SAFE_ID.test(sessionId)) {
      throw new NotFoundError("session", sessionId);
    }
    return path.join(this.dir, `${sessionId}.json`);
  }
}
