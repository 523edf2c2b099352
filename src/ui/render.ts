/**
 * Plain-text rendering of review results for the terminal.
 */

import type { ChangeDetail } from "@doc-review/core";
import type { ReviewListing } from "../domains/review/types.js";

export interface RenderOptions {
  /** Show each commit's own patch instead of the merged diff */
  split?: boolean;
}

const RULE = "─".repeat(72);

/**
 * One group: heading, the commits it covers (newest first), then its diff.
 */
export function renderDetail(detail: ChangeDetail, options: RenderOptions = {}): string {
  const { group } = detail;
  const lines = [
    RULE,
    `${group.filePath}  (${group.groupId})`,
    `${group.author} · ${group.commits.length} commit(s) · ${formatRange(group.oldestDate, group.newestDate)}`,
    ...group.commits.map((commit, i) => `  ${commit.slice(0, 7)} ${group.subjects[i] ?? ""}`.trimEnd()),
    "",
  ];

  const diff = options.split ? detail.splitDiffText : detail.diffText;
  lines.push(diff.trim() === "" ? "(no textual diff)" : diff.trimEnd());
  return `${lines.join("\n")}\n`;
}

export function renderListing(listing: ReviewListing, options: RenderOptions = {}): string {
  const header = `Changes since ${listing.since} (${listing.sortOrder.replace("_", " ")})\n`;
  if (listing.details.length === 0) {
    return `${header}No document changes in this window.\n`;
  }
  return header + listing.details.map((detail) => renderDetail(detail, options)).join("");
}

/**
 * JSON for `--json`. Dates are written as ISO-8601 strings.
 */
export function renderJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function formatRange(oldest: Date, newest: Date): string {
  const from = oldest.toISOString().slice(0, 10);
  const to = newest.toISOString().slice(0, 10);
  return from === to ? from : `${from} → ${to}`;
}
