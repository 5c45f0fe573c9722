/**
 * Category Domain Model
 *
 * A category groups tasks and carries the per-session quota: how many of its
 * own tasks are drawn for each exam session.
 */

export interface Category {
  id: string;
  name: string;
  quota: number; // Non-negative integer
}

/**
 * Check that a quota value is usable for drawing
 */
export function isValidQuota(quota: unknown): quota is number {
  return typeof quota === "number" && Number.isInteger(quota) && quota >= 0;
}
