import type { VcsGateway } from '../../git/gateway.js';
import { synthesizePatch } from './patch.js';

// ─── Types ──────────────────────────────────────────────────────────────────

/**
 * Everything a merged-diff strategy may look at for one group.
 */
export interface MergedDiffContext {
  gateway: VcsGateway;
  filePath: string;
  /** Parent of the group's oldest commit, or the empty tree */
  baseRef: string;
  /** The group's newest commit */
  headRef: string;
  baseContent: string;
  headContent: string;
}

/**
 * One way of producing the merged diff. Returns null when it has nothing
 * usable, letting the next strategy try.
 */
export interface MergedDiffStrategy {
  readonly name: string;
  attempt(context: MergedDiffContext): Promise<string | null>;
}

export interface MergedDiffResult {
  text: string;
  /** Strategy that produced `text`, or null when none did */
  strategy: string | null;
}

// ─── Strategies ─────────────────────────────────────────────────────────────

/** git's own diff between base and head, restricted to the document. */
export const rangedDiffStrategy: MergedDiffStrategy = {
  name: 'ranged-diff',
  async attempt({ gateway, baseRef, headRef, filePath }) {
    return usable(await gateway.diffBetween(baseRef, headRef, filePath));
  },
};

/**
 * The newest commit's own patch for the document. Covers merge commits,
 * whose ranged diff against a synthetic base can come back empty.
 */
export const headCommitPatchStrategy: MergedDiffStrategy = {
  name: 'head-commit-patch',
  async attempt({ gateway, headRef, filePath }) {
    return usable(await gateway.patchOfCommit(headRef, filePath));
  },
};

/** Last resort: diff the two document texts directly. */
export const synthesizedDiffStrategy: MergedDiffStrategy = {
  name: 'synthesized',
  async attempt({ filePath, baseContent, headContent }) {
    if (!baseContent && !headContent) return null;
    return synthesizePatch(filePath, baseContent, headContent);
  },
};

export const DEFAULT_MERGED_DIFF_STRATEGIES: readonly MergedDiffStrategy[] = [
  rangedDiffStrategy,
  headCommitPatchStrategy,
  synthesizedDiffStrategy,
];

// ─── Resolution ─────────────────────────────────────────────────────────────

/**
 * Try strategies in order; the first non-blank result wins.
 */
export async function resolveMergedDiff(
  strategies: readonly MergedDiffStrategy[],
  context: MergedDiffContext,
): Promise<MergedDiffResult> {
  for (const strategy of strategies) {
    const text = usable(await strategy.attempt(context));
    if (text !== null) {
      return { text, strategy: strategy.name };
    }
  }
  return { text: '', strategy: null };
}

function usable(text: string | null): string | null {
  return text !== null && text.trim().length > 0 ? text : null;
}
