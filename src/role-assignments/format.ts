import type { ClassifiedAssignment } from './types.js';

export interface AssignmentRow {
  role: string;
  kind: string;
  scope: string;
}

export function toRows(assignments: readonly ClassifiedAssignment[]): AssignmentRow[] {
  return assignments.map(assignment => ({
    role: assignment.roleName,
    kind: assignment.kind === 'direct' ? 'Direct' : 'Inherited',
    scope: assignment.scope,
  }));
}

/**
 * Plain text table, columns padded to the widest cell
 */
export function formatAssignmentTable(assignments: readonly ClassifiedAssignment[]): string {
  const headers: AssignmentRow = { role: 'Role', kind: 'Kind', scope: 'Scope' };
  const rows = toRows(assignments);
  const all = [headers, ...rows];

  const roleWidth = Math.max(...all.map(row => row.role.length));
  const kindWidth = Math.max(...all.map(row => row.kind.length));

  const line = (row: AssignmentRow): string =>
    `${row.role.padEnd(roleWidth)}  ${row.kind.padEnd(kindWidth)}  ${row.scope}`.trimEnd();

  return [
    line(headers),
    `${'-'.repeat(roleWidth)}  ${'-'.repeat(kindWidth)}  ${'-'.repeat(5)}`,
    ...rows.map(line),
  ].join('\n');
}

export function formatAssignmentJson(assignments: readonly ClassifiedAssignment[]): string {
  return JSON.stringify(toRows(assignments), null, 2);
}
