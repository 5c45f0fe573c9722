/**
 * Group Domain Model
 *
 * Students sit oral exams alone or in pairs. Groups are formed by the roster
 * import and consumed read-only here.
 */

export interface GroupMember {
  id: string;
  fullName: string;
}

export interface Group {
  id: string;
  name: string; // Display name, e.g. "Team Alpha"
  members: GroupMember[]; // One or two students
}

export const MAX_GROUP_SIZE = 2;

/**
 * A group is usable for an exam when it has one or two members
 */
export function hasValidMemberCount(group: Group): boolean {
  return group.members.length >= 1 && group.members.length <= MAX_GROUP_SIZE;
}
