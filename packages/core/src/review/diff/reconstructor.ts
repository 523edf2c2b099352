import type { ChangeDetail, ChangeGroup } from '../../types/index.js';
import type { VcsGateway } from '../../git/gateway.js';
import { DIFF_BATCH_SIZE } from '../../settings/defaults.js';
import { processInBatches } from '../../utils/index.js';
import { extractFilePatch } from './patch.js';
import { DEFAULT_MERGED_DIFF_STRATEGIES, resolveMergedDiff } from './strategies.js';
import type { MergedDiffStrategy } from './strategies.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface DiffReconstructorOptions {
  /** Merged-diff strategies in priority order */
  strategies?: readonly MergedDiffStrategy[];
  /** Groups reconstructed concurrently by {@link DiffReconstructor.reconstructAll} */
  batchSize?: number;
  /** Called once per group with the strategy that produced its merged diff (null: none) */
  onMergedDiff?: (group: ChangeGroup, strategy: string | null) => void;
}

// ─── Implementation ─────────────────────────────────────────────────────────

/**
 * Rebuilds base/head content and the merged and split diffs for groups.
 *
 * Only reads from the gateway. A ref or path that does not exist degrades the
 * affected field to ''; gateway rejections propagate.
 */
export class DiffReconstructor {
  private readonly strategies: readonly MergedDiffStrategy[];
  private readonly batchSize: number;

  constructor(
    private readonly gateway: VcsGateway,
    private readonly options: DiffReconstructorOptions = {},
  ) {
    this.strategies = options.strategies ?? DEFAULT_MERGED_DIFF_STRATEGIES;
    this.batchSize = options.batchSize ?? DIFF_BATCH_SIZE;
  }

  /**
   * Reconstruct every group, preserving input order.
   */
  async reconstructAll(groups: readonly ChangeGroup[]): Promise<ChangeDetail[]> {
    return processInBatches(groups, (group) => this.reconstruct(group), this.batchSize);
  }

  async reconstruct(group: ChangeGroup): Promise<ChangeDetail> {
    const baseRef = await this.resolveBaseRef(group.oldestCommit);
    const headRef = group.newestCommit;

    const [baseContent, headContent] = await Promise.all([
      this.gateway.showFileAt(baseRef, group.filePath),
      this.gateway.showFileAt(headRef, group.filePath),
    ]);

    const merged = await resolveMergedDiff(this.strategies, {
      gateway: this.gateway,
      filePath: group.filePath,
      baseRef,
      headRef,
      baseContent: baseContent ?? '',
      headContent: headContent ?? '',
    });
    this.options.onMergedDiff?.(group, merged.strategy);

    return {
      group,
      diffText: merged.text,
      splitDiffText: await this.splitDiff(group, merged.text),
      baseContent: baseContent ?? '',
      headContent: headContent ?? '',
    };
  }

  /**
   * Each commit's own patch for the document, in `group.commits` order
   * (newest first). Commits with no block for the path are skipped. A
   * single-commit group reuses the merged diff.
   */
  async splitDiff(group: ChangeGroup, mergedDiff: string): Promise<string> {
    if (group.commits.length <= 1) return mergedDiff;

    const patches = await Promise.all(
      group.commits.map(async (commit) =>
        extractFilePatch(await this.gateway.patchOfCommit(commit), group.filePath),
      ),
    );
    return patches.filter((patch) => patch.trim().length > 0).join('\n');
  }

  /**
   * Parent of the oldest commit, or the empty tree for a root commit.
   */
  private async resolveBaseRef(oldestCommit: string): Promise<string> {
    return (await this.gateway.resolveParent(oldestCommit)) ?? this.gateway.emptyTree();
  }
}
