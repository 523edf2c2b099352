import type { ReviewSettings } from '../types/index.js';

// ─── Documents ──────────────────────────────────────────────────────────────

/** Extensions treated as reviewable documents when none are configured */
export const DEFAULT_DOCUMENT_EXTENSIONS: readonly string[] = ['.md'];

// ─── Review Window ──────────────────────────────────────────────────────────

/** Weekday the window opens on when the project has never been reviewed */
const DEFAULT_REVIEW_WEEKDAY = 'tuesday';

/** Local time (`HH:MM`) paired with the default weekday */
const DEFAULT_REVIEW_TIME = '15:00';

// ─── Diff Reconstruction ────────────────────────────────────────────────────

/** Groups reconstructed concurrently. Each group spawns several git processes. */
export const DIFF_BATCH_SIZE = 5;

// ─── Telemetry ──────────────────────────────────────────────────────────────

/** Length of generated run IDs (characters) */
export const TELEMETRY_RUN_ID_LENGTH = 16;

// ─── Root Settings ──────────────────────────────────────────────────────────

/**
 * Complete default settings.
 * Every configurable value lives here.
 */
export const DEFAULT_SETTINGS: ReviewSettings = {
  repoPath: '.',
  lastRun: null,
  defaultWeekday: DEFAULT_REVIEW_WEEKDAY,
  defaultTime: DEFAULT_REVIEW_TIME,
  pathFilters: [],
  sortOrder: 'newest_first',
  documentExtensions: [...DEFAULT_DOCUMENT_EXTENSIONS],
  logLevel: 'info',
};
