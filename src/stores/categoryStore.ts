import fs from "fs";
import path from "path";
import { Category, isValidQuota } from "../domain/category";
import { ConfigError } from "../domain/errors";
import { config } from "../config";
import { compareIds } from "./taskStore";

/**
 * CategoryStore reads categories and their quotas from
 * <dataDir>/catalog/categories.json. Read-only.
 */
export class CategoryStore {
  private readonly filePath: string;

  constructor(dataDir: string = config.dataDir) {
    this.filePath = path.join(dataDir, "catalog", "categories.json");
  }

  /**
   * All categories, sorted by id
   */
  listCategories(): Category[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      console.error("Error loading categories:", err);
      throw new ConfigError(`Category file at ${this.filePath} is not valid JSON`);
    }

    if (!Array.isArray(raw)) {
      throw new ConfigError(`Category file at ${this.filePath} must be an array`);
    }

    return raw.map(parseCategory).sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Quota per category id
   */
  quotas(): Map<string, number> {
    return new Map(this.listCategories().map((c) => [c.id, c.quota]));
  }
}

export function parseCategory(raw: unknown): Category {
  if (typeof raw !== "object" || raw === null || !("id" in raw) || typeof raw.id !== "string") {
    throw new ConfigError("Category entry without an id");
  }
  const id = raw.id;
  const name = "name" in raw && typeof raw.name === "string" ? raw.name : id;
  const quota = "quota" in raw ? raw.quota : undefined;

  if (!isValidQuota(quota)) {
    throw new ConfigError(`Invalid quota ${String(quota)} for category "${name}"`, id);
  }

  return { id, name, quota };
}
