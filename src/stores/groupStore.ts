import fs from "fs";
import path from "path";
import { Group, GroupMember } from "../domain/group";
import { ConfigError } from "../domain/errors";
import { config } from "../config";

/**
 * GroupStore reads the roster written by the roster import (<dataDir>/groups.json).
 * The exam engine only looks groups up; it never edits them.
 *
 * File shape: { groups: Group[], lastUpdated }. Malformed entries are logged
 * and skipped.
 */
export class GroupStore {
  private readonly filePath: string;

  constructor(dataDir: string = config.dataDir) {
    this.filePath = path.join(dataDir, "groups.json");
  }

  /**
   * Load a group by ID
   */
  load(groupId: string): Group | null {
    return this.getAll().find((g) => g.id === groupId) || null;
  }

  /**
   * Get all groups, sorted by name
   */
  getAll(): Group[] {
    return this.loadAll().sort((a, b) => a.name.localeCompare(b.name));
  }

  private loadAll(): Group[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    let entries: unknown[];
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
      if (!isRecord(raw) || !Array.isArray(raw.groups)) {
        throw new ConfigError(`Roster at ${this.filePath} has no groups list`);
      }
      entries = raw.groups;
    } catch (err) {
      console.error("Error loading groups:", err);
      return [];
    }

    const groups: Group[] = [];
    for (const entry of entries) {
      try {
        groups.push(parseGroup(entry));
      } catch (err) {
        console.error("Skipping invalid group:", err);
      }
    }
    return groups;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMember(raw: unknown, groupId: string): GroupMember {
  if (!isRecord(raw) || typeof raw.id !== "string" || typeof raw.fullName !== "string") {
    throw new ConfigError(`Group "${groupId}" has a member without id or fullName`, groupId);
  }
  return { id: raw.id, fullName: raw.fullName };
}

/**
 * Validate one roster entry. Member count is checked when a session is created.
 */
export function parseGroup(raw: unknown): Group {
  if (!isRecord(raw) || typeof raw.id !== "string" || raw.id.trim() === "") {
    throw new ConfigError("Roster entry without a group id");
  }
  const id = raw.id;
  if (!Array.isArray(raw.members)) {
    throw new ConfigError(`Group "${id}" has no members list`, id);
  }

  return {
    id,
    name: typeof raw.name === "string" && raw.name.trim() !== "" ? raw.name : id,
    members: raw.members.map((m) => parseMember(m, id)),
  };
}
