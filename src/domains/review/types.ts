import type { ChangeDetail, SortOrder } from "@doc-review/core";

export interface ListParams {
  /** Whole weeks to widen the window by */
  weeksBack?: number;
}

export interface ShowParams {
  groupId: string;
  weeksBack?: number;
}

/**
 * A completed review pass, ordered for presentation.
 */
export interface ReviewListing {
  runId: string;
  /** Window start, ISO-8601 */
  since: string;
  sortOrder: SortOrder;
  commitCount: number;
  details: ChangeDetail[];
}

export interface SyncOutcome {
  /** What the pull printed */
  output: string;
  durationMs: number;
}
