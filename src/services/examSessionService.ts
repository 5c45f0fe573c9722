/**
 * Exam Session Service
 *
 * The operations instructors and students reach through the API and console:
 * - Create a draft session for a group
 * - Draw its tasks (once, under a per-session lock)
 * - Read the instructor and student views
 * - Complete the session
 *
 * Collaborators are injected so tests can use in-memory catalogs; the
 * defaults are the JSON file stores.
 */

import { randomUUID } from "crypto";
import { Category } from "../domain/category";
import { Group, hasValidMemberCount } from "../domain/group";
import { Task } from "../domain/task";
import { buildGraph } from "../domain/dependencyGraph";
import { drawAssignment } from "../domain/assignmentEngine";
import {
  ExamSession,
  activateSession,
  completeSession as completeSessionRecord,
  createDraftSession,
  isAssigned,
} from "../domain/examSession";
import {
  InstructorView,
  StudentView,
  projectInstructorView,
  projectStudentView,
} from "../domain/examViews";
import {
  RandomSourceFactory,
  createSeededRandom,
  generateSeed,
  isValidSeed,
} from "../domain/randomSource";
import { ConcurrencyError, ConfigError, NotFoundError, isExamError } from "../domain/errors";
import { TaskStore } from "../stores/taskStore";
import { CategoryStore } from "../stores/categoryStore";
import { GroupStore } from "../stores/groupStore";
import { ExamSessionStore } from "../stores/examSessionStore";
import { SessionLock } from "./sessionLock";
import { config } from "../config";

// ============================================
// Collaborator Interfaces
// ============================================

type MaybePromise<T> = T | Promise<T>;

export interface CatalogReader {
  listTasksByCategory(): MaybePromise<Map<string, Task[]>>;
}

export interface CategoryConfig {
  listCategories(): MaybePromise<Category[]>;
}

export interface GroupDirectory {
  load(groupId: string): MaybePromise<Group | null>;
}

export interface ExamSessionRepository {
  load(sessionId: string): MaybePromise<ExamSession | null>;
  save(session: ExamSession): MaybePromise<void>;
  getAll(): MaybePromise<ExamSession[]>;
}

export interface ExamSessionServiceDeps {
  catalog: CatalogReader;
  categories: CategoryConfig;
  groups: GroupDirectory;
  sessions: ExamSessionRepository;
  lock?: SessionLock;
  randomFactory?: RandomSourceFactory;
  seedGenerator?: () => number;
  clock?: () => Date;
  idGenerator?: () => string;
  pollIntervalMs?: number;
}

// ============================================
// Result Types
// ============================================

export interface AssignmentOutcome {
  session: ExamSession;
  assignedTaskIds: string[];
  alreadyAssigned: boolean; // True when an earlier call had already drawn the tasks
}

// ============================================
// Main Service Class
// ============================================

export class ExamSessionService {
  private readonly catalog: CatalogReader;
  private readonly categories: CategoryConfig;
  private readonly groups: GroupDirectory;
  private readonly sessions: ExamSessionRepository;
  private readonly lock: SessionLock;
  private readonly randomFactory: RandomSourceFactory;
  private readonly seedGenerator: () => number;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly pollIntervalMs: number;

  constructor(deps: ExamSessionServiceDeps) {
    this.catalog = deps.catalog;
    this.categories = deps.categories;
    this.groups = deps.groups;
    this.sessions = deps.sessions;
    this.lock = deps.lock ?? new SessionLock(config.assignmentLockTimeoutMs);
    this.randomFactory = deps.randomFactory ?? createSeededRandom;
    this.seedGenerator = deps.seedGenerator ?? generateSeed;
    this.clock = deps.clock ?? (() => new Date());
    this.idGenerator = deps.idGenerator ?? randomUUID;
    this.pollIntervalMs = deps.pollIntervalMs ?? config.studentPollIntervalMs;
  }

  // ============================================
  // 1. Create Session
  // ============================================

  async createSession(groupId: string): Promise<ExamSession> {
    const group = await this.groups.load(groupId);
    if (!group) {
      throw new NotFoundError("group", groupId);
    }
    if (!hasValidMemberCount(group)) {
      throw new ConfigError(`Group "${group.name}" must have one or two members`, group.id);
    }

    const session = createDraftSession(this.idGenerator(), group.id, this.clock());
    await this.sessions.save(session);
    logExamEvent(`Created session ${session.id} for group ${group.name}`);
    return session;
  }

  // ============================================
  // 2. Compute Assignment
  // ============================================

  /**
   * Draw the session's tasks. Runs at most once per session: later or
   * overlapping calls return the stored assignment instead of drawing again.
   * On any failure the session stays draft and nothing is written.
   */
  async computeAssignment(sessionId: string, seed?: number): Promise<AssignmentOutcome> {
    if (seed !== undefined && !isValidSeed(seed)) {
      throw new ConfigError(`Seed must be an integer between 0 and 4294967295, got ${seed}`);
    }

    return this.lock.runExclusive(sessionId, async () => {
      const session = await this.requireSession(sessionId);
      if (isAssigned(session)) {
        return { session, assignedTaskIds: session.assignedTaskIds, alreadyAssigned: true };
      }

      try {
        const [tasksByCategory, categories] = await Promise.all([
          this.catalog.listTasksByCategory(),
          this.categories.listCategories(),
        ]);
        const graph = buildGraph([...tasksByCategory.values()].flat());

        const usedSeed = seed ?? this.seedGenerator();
        const result = drawAssignment({
          categories,
          tasksByCategory,
          graph,
          random: this.randomFactory(usedSeed),
        });
        const activated = activateSession(session, result, usedSeed, this.clock());

        // Another writer (e.g. a second process) may have assigned it meanwhile
        const current = await this.sessions.load(sessionId);
        if (!current || current.status !== "draft") {
          throw new ConcurrencyError(sessionId, "session changed while tasks were being drawn");
        }

        await this.sessions.save(activated);
        logExamEvent(
          `Assigned ${activated.assignedTaskIds.length} task(s) to session ${sessionId} (seed ${usedSeed})`
        );
        return { session: activated, assignedTaskIds: activated.assignedTaskIds, alreadyAssigned: false };
      } catch (error) {
        if (isExamError(error)) {
          logExamEvent(`Assignment failed for session ${sessionId}: ${error.message}`);
        }
        throw error;
      }
    });
  }

  // ============================================
  // 3. Views
  // ============================================

  async getInstructorView(sessionId: string): Promise<InstructorView> {
    const session = await this.requireSession(sessionId);
    const group = (await this.groups.load(session.groupId)) ?? undefined;
    if (!isAssigned(session)) {
      return projectInstructorView(session, new Map(), new Map(), group);
    }

    const [tasks, categories] = await this.loadCatalogMaps();
    return projectInstructorView(session, tasks, categories, group);
  }

  /**
   * Redacted view for students; pure read, safe to poll
   */
  async getStudentView(sessionId: string): Promise<StudentView> {
    const session = await this.requireSession(sessionId);
    if (!isAssigned(session)) {
      return projectStudentView(session, new Map(), new Map(), this.pollIntervalMs);
    }

    const [tasks, categories] = await this.loadCatalogMaps();
    return projectStudentView(session, tasks, categories, this.pollIntervalMs);
  }

  // ============================================
  // 4. Complete Session
  // ============================================

  /**
   * active → completed. Repeating it on a completed session is a no-op.
   */
  async completeSession(sessionId: string): Promise<ExamSession> {
    return this.lock.runExclusive(sessionId, async () => {
      const session = await this.requireSession(sessionId);
      const completed = completeSessionRecord(session, this.clock());
      if (completed !== session) {
        await this.sessions.save(completed);
        logExamEvent(`Completed session ${sessionId}`);
      }
      return completed;
    });
  }

  // ============================================
  // Queries
  // ============================================

  async getSession(sessionId: string): Promise<ExamSession> {
    return this.requireSession(sessionId);
  }

  /**
   * Sessions, newest first, optionally for one group
   */
  async listSessions(groupId?: string): Promise<ExamSession[]> {
    const sessions = await this.sessions.getAll();
    return sessions
      .filter((s) => groupId === undefined || s.groupId === groupId)
      .sort((a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime());
  }

  // ============================================
  // Helpers
  // ============================================

  private async requireSession(sessionId: string): Promise<ExamSession> {
    const session = await this.sessions.load(sessionId);
    if (!session) {
      throw new NotFoundError("session", sessionId);
    }
    return session;
  }

  private async loadCatalogMaps(): Promise<[Map<string, Task>, Map<string, Category>]> {
    const [tasksByCategory, categories] = await Promise.all([
      this.catalog.listTasksByCategory(),
      this.categories.listCategories(),
    ]);
    const tasks = new Map<string, Task>();
    for (const list of tasksByCategory.values()) {
      for (const task of list) tasks.set(task.id, task);
    }
    return [tasks, new Map(categories.map((c) => [c.id, c]))];
  }
}

function logExamEvent(message: string): void {
  if (process.env.NODE_ENV !== "test") {
    console.log(`[EXAM] ${message}`);
  }
}

/**
 * Service wired to the JSON file stores under the configured data directory
 */
export function createExamSessionService(dataDir: string = config.dataDir): ExamSessionService {
  return new ExamSessionService({
    catalog: new TaskStore(dataDir),
    categories: new CategoryStore(dataDir),
    groups: new GroupStore(dataDir),
    sessions: new ExamSessionStore(dataDir),
  });
}
