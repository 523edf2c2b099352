/**
 * A commit as read from the review-window log query.
 * One per `==COMMIT==` block; never mutated after parsing.
 */
export interface CommitRecord {
  /** Full commit hash */
  readonly hash: string;
  readonly authorName: string;
  readonly authorEmail: string;
  /** Author date. Parsed from an ISO-8601 string that carried its own offset. */
  readonly date: Date;
  /** First line of the commit message */
  readonly subject: string;
  /** Paths touched by the commit, relative to the repository top level, in log order */
  readonly files: readonly string[];
}

/**
 * One in-scope document touched by one commit.
 */
export interface ChangeEntry {
  commit: string;
  author: string;
  date: Date;
  subject: string;
  filePath: string;
}

/**
 * All in-window changes to one document by one author.
 *
 * `commits[i]` and `subjects[i]` describe the same commit. Entries arrive
 * newest-first, so `newestCommit` is the first commit seen for the key and
 * `oldestCommit` the last.
 */
export interface ChangeGroup {
  /** `filePath|newestCommit`. Stable across runs; summary caches key on it. */
  groupId: string;
  filePath: string;
  author: string;
  newestCommit: string;
  oldestCommit: string;
  newestDate: Date;
  oldestDate: Date;
  subjects: string[];
  commits: string[];
}

/**
 * A group with its reconstructed content and diffs.
 */
export interface ChangeDetail {
  group: ChangeGroup;
  /** Merged diff, base → head */
  diffText: string;
  /** Per-commit patches for the document, concatenated */
  splitDiffText: string;
  /** Document text before the group's oldest commit ('' when it did not exist) */
  baseContent: string;
  /** Document text at the group's newest commit ('' when it was deleted) */
  headContent: string;
}

/** Order in which a caller presents details. The pass itself always yields newest-first. */
export type SortOrder = 'newest_first' | 'oldest_first';
