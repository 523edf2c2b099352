import type { SortOrder } from './review.js';

export type Weekday =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Everything the review engine and its host read from configuration.
 */
export interface ReviewSettings {
  /** Document root, relative to the directory holding the config folder */
  repoPath: string;
  /** End of the previous review (ISO-8601 with offset), or null when never reviewed */
  lastRun: string | null;
  /** Weekday used to derive the window start when `lastRun` is null */
  defaultWeekday: Weekday;
  /** Local time of day (`HH:MM`) paired with `defaultWeekday` */
  defaultTime: string;
  /** Ordered glob rules; a leading `!` re-includes */
  pathFilters: string[];
  sortOrder: SortOrder;
  /** Extensions (with dot) that count as documents */
  documentExtensions: string[];
  logLevel: LogLevelName;
}
