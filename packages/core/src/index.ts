// ─── Types ──────────────────────────────────────────────────────────────────
// Consumers should import types from '@doc-review/core' directly.

export type {
  CommitRecord,
  ChangeEntry,
  ChangeGroup,
  ChangeDetail,
  SortOrder,
  Weekday,
  LogLevelName,
  ReviewSettings,
} from './types/index.js';

// ─── Settings ───────────────────────────────────────────────────────────────
export {
  DEFAULT_SETTINGS,
  DEFAULT_DOCUMENT_EXTENSIONS,
  DIFF_BATCH_SIZE,
  TELEMETRY_RUN_ID_LENGTH,
} from './settings/defaults.js';

export {
  VALID_WEEKDAYS,
  VALID_SORT_ORDERS,
  VALID_LOG_LEVELS,
  readRawSettings,
  normalizeSettings,
  validateSettings,
  parseTimeOfDay,
} from './settings/schema.js';
export type { RawSettings } from './settings/schema.js';

export { resolveReviewSince, defaultSince } from './settings/window.js';

// ─── Telemetry ─────────────────────────────────────────────────────────────
export type { ITelemetry, TelemetryEvent } from './telemetry/index.js';
export { NullTelemetry } from './telemetry/index.js';

// ─── Git Operations ─────────────────────────────────────────────────────────
export {
  // Executor
  execGit,
  execGitStrict,
  isGitRepo,
  getRepoRoot,
  GitUnavailableError,
  // Gateway
  GitGateway,
  // Log
  getCommitsSince,
  parseLogOutput,
  parseZonedTimestamp,
  LogParseError,
  COMMIT_SENTINEL,
  LOG_PRETTY_FORMAT,
} from './git/index.js';

export type { GitExecOptions, GitExecResult, VcsGateway } from './git/index.js';

// ─── Review ─────────────────────────────────────────────────────────────────
export {
  isExcluded,
  compilePathRule,
  compilePathRules,
  normalizeRulePath,
  buildChangeEntries,
  hasDocumentExtension,
  isMarkdownDocument,
  groupChanges,
  buildGroupId,
  GROUP_ID_SEPARATOR,
  DiffReconstructor,
  extractFilePatch,
  synthesizePatch,
  rangedDiffStrategy,
  headCommitPatchStrategy,
  synthesizedDiffStrategy,
  resolveMergedDiff,
  DEFAULT_MERGED_DIFF_STRATEGIES,
  runReviewPass,
  collectChangeGroups,
  findChangeDetail,
  applySortOrder,
  ReviewPassError,
} from './review/index.js';

export type {
  PathRule,
  ChangeIndexOptions,
  DocumentPredicate,
  DiffReconstructorOptions,
  MergedDiffContext,
  MergedDiffStrategy,
  MergedDiffResult,
  ReviewPassOptions,
  ReviewPassResult,
  ReviewGrouping,
  ReviewStage,
} from './review/index.js';

// ─── Utils ──────────────────────────────────────────────────────────────────
export { generateId, processInBatches } from './utils/index.js';
