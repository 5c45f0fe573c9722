/**
 * Task Domain Model
 *
 * A task is one oral-exam question from the catalog. The catalog is managed
 * outside this engine; tasks are read-only here.
 *
 * Relationships:
 * - Task belongs to a Category (via categoryId)
 * - Task requires other Tasks (must be assigned alongside it)
 * - Task excludes other Tasks (may never share a session with it)
 */

export interface Task {
  id: string;
  title: string;
  categoryId: string;

  // Informational only, never used for selection
  subcategory?: string;

  // Markdown content, rendered by the client
  prompt: string;
  images?: string[]; // Paths of figures shown with the prompt
  hint?: string; // Instructor-only
  solution?: string; // Instructor-only

  requires: string[]; // Task IDs that must be assigned with this one
  excludes: string[]; // Task IDs that may not co-occur (symmetric in effect)
}
