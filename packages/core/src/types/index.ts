export type { CommitRecord, ChangeEntry, ChangeGroup, ChangeDetail, SortOrder } from './review.js';
export type { Weekday, LogLevelName, ReviewSettings } from './settings.js';
