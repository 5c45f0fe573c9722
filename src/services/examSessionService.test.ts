import {
  ExamSessionRepository,
  ExamSessionService,
  ExamSessionServiceDeps,
} from "./examSessionService";
import { SessionLock } from "./sessionLock";
import { ExamSession } from "../domain/examSession";
import { Category } from "../domain/category";
import { Group } from "../domain/group";
import { Task } from "../domain/task";
import {
  ConcurrencyError,
  ConfigError,
  DependencyConflictError,
  InsufficientTasksError,
  NotFoundError,
  SessionStateError,
} from "../domain/errors";

// ============================================
// In-memory collaborators
// ============================================

class InMemorySessions implements ExamSessionRepository {
  records = new Map<string, ExamSession>();
  saveCount = 0;

  load(sessionId: string): ExamSession | null {
    return this.records.get(sessionId) ?? null;
  }

  save(session: ExamSession): void {
    this.saveCount++;
    this.records.set(session.id, session);
  }

  getAll(): ExamSession[] {
    return [...this.records.values()];
  }
}

const task = (id: string, categoryId: string, requires: string[] = []): Task => ({
  id,
  title: `Task ${id}`,
  categoryId,
  prompt: `Prompt ${id}`,
  hint: `Hint ${id}`,
  solution: `Solution ${id}`,
  requires,
  excludes: [],
});

const groupByCategory = (tasks: Task[]): Map<string, Task[]> => {
  const map = new Map<string, Task[]>();
  for (const t of tasks) {
    map.set(t.categoryId, [...(map.get(t.categoryId) ?? []), t]);
  }
  return map;
};

const defaultCategories: Category[] = [
  { id: "algorithms", name: "Algorithms", quota: 1 },
  { id: "basics", name: "Basics", quota: 1 },
];

const defaultTasks = [
  task("b1", "basics"),
  task("b2", "basics"),
  task("b3", "basics"),
  task("x", "algorithms", ["b1"]),
  task("y", "algorithms"),
  task("z", "algorithms"),
];

const groups: Group[] = [
  { id: "group-1", name: "Team Alpha", members: [{ id: "s1", fullName: "Ada Example" }] },
  { id: "group-2", name: "Team Beta", members: [{ id: "s2", fullName: "Ben Sample" }] },
  {
    id: "group-crowded",
    name: "Too Many",
    members: [
      { id: "s3", fullName: "One" },
      { id: "s4", fullName: "Two" },
      { id: "s5", fullName: "Three" },
    ],
  },
];

interface Setup {
  service: ExamSessionService;
  sessions: InMemorySessions;
}

function setup(overrides: Partial<ExamSessionServiceDeps> = {}, tasks: Task[] = defaultTasks): Setup {
  const sessions = new InMemorySessions();
  let nextId = 0;
  let minute = 0;

  const service = new ExamSessionService({
    catalog: { listTasksByCategory: () => groupByCategory(tasks) },
    categories: { listCategories: () => defaultCategories },
    groups: { load: (id) => groups.find((g) => g.id === id) ?? null },
    sessions,
    lock: new SessionLock(),
    seedGenerator: () => 7,
    clock: () => new Date(Date.UTC(2026, 2, 2, 9, minute++)),
    idGenerator: () => `exam-${++nextId}`,
    pollIntervalMs: 3000,
    ...overrides,
  });

  return { service, sessions };
}

// ============================================
// Tests
// ============================================

describe("ExamSessionService", () => {
  describe("createSession", () => {
    it("creates and stores a draft session", async () => {
      const { service, sessions } = setup();

      const session = await service.createSession("group-1");

      expect(session).toEqual({
        id: "exam-1",
        groupId: "group-1",
        status: "draft",
        seed: null,
        assignedTaskIds: [],
        dependencyTaskIds: [],
        createdAt: "2026-03-02T09:00:00.000Z",
      });
      expect(sessions.load("exam-1")).toEqual(session);
    });

    it("rejects an unknown group", async () => {
      const { service } = setup();

      await expect(service.createSession("nobody")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("rejects a group with more than two members", async () => {
      const { service } = setup();

      await expect(service.createSession("group-crowded")).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe("computeAssignment", () => {
    it("activates the session and records the seed", async () => {
      const { service, sessions } = setup();
      const { id } = await service.createSession("group-1");

      const outcome = await service.computeAssignment(id, 42);

      expect(outcome.alreadyAssigned).toBe(false);
      expect(outcome.session.status).toBe("active");
      expect(outcome.session.seed).toBe(42);
      expect(outcome.assignedTaskIds).toEqual(outcome.session.assignedTaskIds);
      expect(sessions.load(id)).toEqual(outcome.session);
    });

    it("uses a generated seed when none is given", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");

      const outcome = await service.computeAssignment(id);

      expect(outcome.session.seed).toBe(7);
    });

    it("draws the same tasks for two sessions with the same seed", async () => {
      const { service } = setup();
      const first = await service.createSession("group-1");
      const second = await service.createSession("group-2");

      const a = await service.computeAssignment(first.id, 1234);
      const b = await service.computeAssignment(second.id, 1234);

      expect(b.assignedTaskIds).toEqual(a.assignedTaskIds);
    });

    it("returns the stored assignment instead of drawing again", async () => {
      const { service, sessions } = setup();
      const { id } = await service.createSession("group-1");
      const first = await service.computeAssignment(id, 42);

      const again = await service.computeAssignment(id, 99);

      expect(again.alreadyAssigned).toBe(true);
      expect(again.assignedTaskIds).toEqual(first.assignedTaskIds);
      expect(again.session.seed).toBe(42);
      expect(sessions.saveCount).toBe(2);
    });

    it("persists one result when two calls overlap", async () => {
      const slowCatalog = {
        listTasksByCategory: () =>
          new Promise<Map<string, Task[]>>((resolve) =>
            setTimeout(() => resolve(groupByCategory(defaultTasks)), 5)
          ),
      };
      const { service, sessions } = setup({ catalog: slowCatalog });
      const { id } = await service.createSession("group-1");

      const [a, b] = await Promise.all([
        service.computeAssignment(id, 1),
        service.computeAssignment(id, 2),
      ]);

      expect(a.alreadyAssigned).toBe(false);
      expect(b.alreadyAssigned).toBe(true);
      expect(b.assignedTaskIds).toEqual(a.assignedTaskIds);
      expect(b.session.seed).toBe(1);
      expect(sessions.saveCount).toBe(2);
    });

    it("leaves the session in draft when a category runs short", async () => {
      const { service, sessions } = setup({
        categories: {
          listCategories: () => [
            { id: "algorithms", name: "Algorithms", quota: 3 },
            { id: "basics", name: "Basics", quota: 1 },
          ],
        },
      }, [task("b1", "basics"), task("x", "algorithms"), task("y", "algorithms")]);
      const { id } = await service.createSession("group-1");

      await expect(service.computeAssignment(id, 42)).rejects.toBeInstanceOf(InsufficientTasksError);

      const stored = sessions.load(id);
      expect(stored?.status).toBe("draft");
      expect(stored?.assignedTaskIds).toEqual([]);
      expect(sessions.saveCount).toBe(1);
    });

    it("discards the draw when another writer activated the session meanwhile", async () => {
      const sessions = new InMemorySessions();
      const { service } = setup({
        sessions,
        catalog: {
          listTasksByCategory: () => {
            const current = sessions.load("exam-1");
            if (current) {
              sessions.save({ ...current, status: "active", seed: 5, assignedTaskIds: ["y", "b2"] });
            }
            return groupByCategory(defaultTasks);
          },
        },
      });
      await service.createSession("group-1");

      await expect(service.computeAssignment("exam-1", 42)).rejects.toBeInstanceOf(ConcurrencyError);
      expect(sessions.load("exam-1")?.assignedTaskIds).toEqual(["y", "b2"]);
    });

    it("keeps a later call waiting for the first draw after another call timed out", async () => {
      let openCatalog: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        openCatalog = resolve;
      });
      const gatedCatalog = {
        listTasksByCategory: async () => {
          await gate;
          return groupByCategory(defaultTasks);
        },
      };
      const { service, sessions } = setup({ catalog: gatedCatalog, lock: new SessionLock(10) });
      const { id } = await service.createSession("group-1");

      const first = service.computeAssignment(id, 1);
      await expect(service.computeAssignment(id, 2)).rejects.toBeInstanceOf(ConcurrencyError);
      const third = service.computeAssignment(id, 3);
      openCatalog();

      const [a, c] = await Promise.all([first, third]);

      expect(a.alreadyAssigned).toBe(false);
      expect(c.alreadyAssigned).toBe(true);
      expect(c.assignedTaskIds).toEqual(a.assignedTaskIds);
      expect(c.session.seed).toBe(1);
      expect(sessions.load(id)).toEqual(a.session);
      expect(sessions.saveCount).toBe(2);
    });

    it("leaves the session in draft when drawn tasks conflict", async () => {
      const { service, sessions } = setup(
        {
          categories: {
            listCategories: () => [
              { id: "main", name: "Main", quota: 2 },
              { id: "prereq", name: "Prerequisites", quota: 0 },
            ],
          },
        },
        [
          task("p1", "main", ["a"]),
          task("p2", "main", ["b"]),
          { ...task("a", "prereq"), excludes: ["b"] },
          task("b", "prereq"),
        ]
      );
      const { id } = await service.createSession("group-1");

      await expect(service.computeAssignment(id, 42)).rejects.toBeInstanceOf(DependencyConflictError);

      const stored = sessions.load(id);
      expect(stored?.status).toBe("draft");
      expect(stored?.assignedTaskIds).toEqual([]);
      expect(sessions.saveCount).toBe(1);
    });

    it("leaves the session in draft when the catalog has a requires cycle", async () => {
      const { service, sessions } = setup({}, [
        task("b1", "basics", ["b2"]),
        task("b2", "basics", ["b1"]),
        task("y", "algorithms"),
      ]);
      const { id } = await service.createSession("group-1");

      await expect(service.computeAssignment(id, 42)).rejects.toBeInstanceOf(ConfigError);

      const stored = sessions.load(id);
      expect(stored?.status).toBe("draft");
      expect(stored?.assignedTaskIds).toEqual([]);
      expect(sessions.saveCount).toBe(1);
    });

    it("rejects an invalid seed", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");

      await expect(service.computeAssignment(id, -1)).rejects.toBeInstanceOf(ConfigError);
    });

    it("rejects an unknown session", async () => {
      const { service } = setup();

      await expect(service.computeAssignment("missing", 1)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("views", () => {
    it("shows pending and not-ready views before the draw", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");

      const instructor = await service.getInstructorView(id);
      const student = await service.getStudentView(id);

      expect(instructor.kind).toBe("pending");
      expect(instructor.group?.name).toBe("Team Alpha");
      expect(student.ready).toBe(false);
      expect(student.tasks).toEqual([]);
      expect(student.pollIntervalMs).toBe(3000);
    });

    it("shows the same tasks to both audiences, redacted for students", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");
      const { assignedTaskIds } = await service.computeAssignment(id, 42);

      const instructor = await service.getInstructorView(id);
      const student = await service.getStudentView(id);

      expect(instructor.kind).toBe("assigned");
      if (instructor.kind === "assigned") {
        expect(instructor.tasks.map((t) => t.taskId)).toEqual(assignedTaskIds);
        expect(instructor.tasks[0].solution).toBe(`Solution ${assignedTaskIds[0]}`);
      }
      expect(student.ready).toBe(true);
      expect(student.tasks.map((t) => t.taskId)).toEqual(assignedTaskIds);
      expect(student.tasks[0]).not.toHaveProperty("solution");
    });
  });

  describe("completeSession", () => {
    it("completes an active session and ignores repeats", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");
      await service.computeAssignment(id, 42);

      const completed = await service.completeSession(id);
      const again = await service.completeSession(id);

      expect(completed.status).toBe("completed");
      expect(again.completedAt).toBe(completed.completedAt);
    });

    it("rejects completing a draft session", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");

      await expect(service.completeSession(id)).rejects.toBeInstanceOf(SessionStateError);
    });

    it("keeps the assignment fixed after completion", async () => {
      const { service } = setup();
      const { id } = await service.createSession("group-1");
      const first = await service.computeAssignment(id, 42);
      await service.completeSession(id);

      const after = await service.computeAssignment(id, 43);

      expect(after.alreadyAssigned).toBe(true);
      expect(after.session.status).toBe("completed");
      expect(after.assignedTaskIds).toEqual(first.assignedTaskIds);
    });
  });

  describe("listSessions", () => {
    it("lists newest first and filters by group", async () => {
      const { service } = setup();
      await service.createSession("group-1");
      await service.createSession("group-2");
      await service.createSession("group-1");

      const all = await service.listSessions();
      const forGroup = await service.listSessions("group-1");

      expect(all.map((s) => s.id)).toEqual(["exam-3", "exam-2", "exam-1"]);
      expect(forGroup.map((s) => s.id)).toEqual(["exam-3", "exam-1"]);
    });
  });
});
