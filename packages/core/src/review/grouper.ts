import type { ChangeEntry, ChangeGroup } from '../types/index.js';

/** Joins path and newest commit in a group id. */
export const GROUP_ID_SEPARATOR = '|';

/**
 * Fold newest-first change entries into per-(author, document) groups.
 *
 * Entries for the same author and path merge even when other entries sit
 * between them. Because input is newest-first, each later entry for a key
 * moves the group's oldest commit back. Groups come out in first-seen order.
 */
export function groupChanges(entries: readonly ChangeEntry[]): ChangeGroup[] {
  // Arena: groups in first-seen order, plus key → position
  const groups: ChangeGroup[] = [];
  const positions = new Map<string, number>();

  for (const entry of entries) {
    const key = groupKey(entry.author, entry.filePath);
    const position = positions.get(key);

    if (position === undefined) {
      positions.set(key, groups.length);
      groups.push(openGroup(entry));
      continue;
    }

    const group = groups[position];
    group.subjects.push(entry.subject);
    group.commits.push(entry.commit);
    group.oldestCommit = entry.commit;
    group.oldestDate = entry.date;
  }

  return groups;
}

export function buildGroupId(filePath: string, newestCommit: string): string {
  return `${filePath}${GROUP_ID_SEPARATOR}${newestCommit}`;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function openGroup(entry: ChangeEntry): ChangeGroup {
  return {
    groupId: buildGroupId(entry.filePath, entry.commit),
    filePath: entry.filePath,
    author: entry.author,
    newestCommit: entry.commit,
    oldestCommit: entry.commit,
    newestDate: entry.date,
    oldestDate: entry.date,
    subjects: [entry.subject],
    commits: [entry.commit],
  };
}

/** Tuple encoding keeps `a|b` + `c` distinct from `a` + `b|c`. */
function groupKey(author: string, filePath: string): string {
  return JSON.stringify([author, filePath]);
}
