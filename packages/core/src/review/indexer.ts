import type { ChangeEntry, CommitRecord } from '../types/index.js';
import { compilePathRules, isExcluded } from './path-filter.js';
import { DEFAULT_DOCUMENT_EXTENSIONS } from '../settings/defaults.js';

export type DocumentPredicate = (path: string) => boolean;

export interface ChangeIndexOptions {
  /** Ordered path rules (see {@link isExcluded}) */
  rules?: readonly string[];
  /** Segment from the repository top level to the document root */
  repoPrefix?: string;
  /** Which touched files count as documents. Defaults to Markdown. */
  isDocument?: DocumentPredicate;
}

/**
 * Predicate matching paths that end in one of `extensions`, ignoring case.
 */
export function hasDocumentExtension(extensions: readonly string[]): DocumentPredicate {
  const suffixes = extensions.map((ext) => ext.toLowerCase());
  return (path) => {
    const lower = path.toLowerCase();
    return suffixes.some((suffix) => lower.endsWith(suffix));
  };
}

export const isMarkdownDocument: DocumentPredicate = hasDocumentExtension(DEFAULT_DOCUMENT_EXTENSIONS);

/**
 * Expand commits into one entry per in-scope document they touch.
 *
 * Commits keep their input order and files their order within a commit.
 * A document touched by several commits yields one entry per commit.
 */
export function buildChangeEntries(
  commits: readonly CommitRecord[],
  options: ChangeIndexOptions = {},
): ChangeEntry[] {
  const { repoPrefix = '', isDocument = isMarkdownDocument } = options;
  const rules = compilePathRules(options.rules ?? []);
  const entries: ChangeEntry[] = [];

  for (const commit of commits) {
    for (const filePath of commit.files) {
      if (!isDocument(filePath)) continue;
      if (isExcluded(filePath, rules, repoPrefix)) continue;

      entries.push({
        commit: commit.hash,
        author: commit.authorName,
        date: commit.date,
        subject: commit.subject,
        filePath,
      });
    }
  }

  return entries;
}
