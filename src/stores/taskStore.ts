import fs from "fs";
import path from "path";
import { Task } from "../domain/task";
import { ConfigError } from "../domain/errors";
import { config } from "../config";

/**
 * TaskStore reads the task catalog from <dataDir>/catalog/tasks.json.
 *
 * The catalog is edited elsewhere; this store never writes it.
 * A missing file is an empty catalog. An unreadable one is a ConfigError,
 * since drawing from a partial catalog would silently change quotas.
 */
export class TaskStore {
  private readonly filePath: string;

  constructor(dataDir: string = config.dataDir) {
    this.filePath = path.join(dataDir, "catalog", "tasks.json");
  }

  /**
   * Get all tasks, sorted by id
   */
  getAll(): Task[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      console.error("Error loading task catalog:", err);
      throw new ConfigError(`Task catalog at ${this.filePath} is not valid JSON`);
    }

    if (!Array.isArray(raw)) {
      throw new ConfigError(`Task catalog at ${this.filePath} must be an array`);
    }

    return raw.map(parseTask).sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Tasks grouped by category, categories in id order
   */
  listTasksByCategory(): Map<string, Task[]> {
    const byCategory = new Map<string, Task[]>();
    for (const task of this.getAll()) {
      const list = byCategory.get(task.categoryId) ?? [];
      list.push(task);
      byCategory.set(task.categoryId, list);
    }
    return new Map([...byCategory.entries()].sort(([a], [b]) => compareIds(a, b)));
  }
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function stringList(value: unknown, field: string, taskId: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new ConfigError(`Task "${taskId}" has an invalid "${field}" list`, taskId);
  }
  return value;
}

/**
 * Validate one catalog entry. requires/excludes default to empty.
 */
export function parseTask(raw: unknown): Task {
  if (!isRecord(raw) || typeof raw.id !== "string" || raw.id.trim() === "") {
    throw new ConfigError("Catalog entry without a task id");
  }
  const id = raw.id;
  if (typeof raw.categoryId !== "string" || typeof raw.prompt !== "string") {
    throw new ConfigError(`Task "${id}" needs a categoryId and a prompt`, id);
  }

  return {
    id,
    title: typeof raw.title === "string" ? raw.title : id,
    categoryId: raw.categoryId,
    subcategory: optionalString(raw.subcategory),
    prompt: raw.prompt,
    images: raw.images === undefined ? undefined : stringList(raw.images, "images", id),
    hint: optionalString(raw.hint),
    solution: optionalString(raw.solution),
    requires: stringList(raw.requires, "requires", id),
    excludes: stringList(raw.excludes, "excludes", id),
  };
}
