// Path filter
export { isExcluded, compilePathRule, compilePathRules, normalizeRulePath } from './path-filter.js';
export type { PathRule } from './path-filter.js';

// Indexer
export { buildChangeEntries, hasDocumentExtension, isMarkdownDocument } from './indexer.js';
export type { ChangeIndexOptions, DocumentPredicate } from './indexer.js';

// Grouper
export { groupChanges, buildGroupId, GROUP_ID_SEPARATOR } from './grouper.js';

// Diff reconstruction
export { DiffReconstructor } from './diff/reconstructor.js';
export type { DiffReconstructorOptions } from './diff/reconstructor.js';
export { extractFilePatch, synthesizePatch } from './diff/patch.js';
export {
  rangedDiffStrategy,
  headCommitPatchStrategy,
  synthesizedDiffStrategy,
  resolveMergedDiff,
  DEFAULT_MERGED_DIFF_STRATEGIES,
} from './diff/strategies.js';
export type { MergedDiffContext, MergedDiffStrategy, MergedDiffResult } from './diff/strategies.js';

// Pass
export {
  runReviewPass,
  collectChangeGroups,
  findChangeDetail,
  applySortOrder,
  ReviewPassError,
} from './pass.js';
export type { ReviewPassOptions, ReviewPassResult, ReviewGrouping, ReviewStage } from './pass.js';
