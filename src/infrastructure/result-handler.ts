/**
 * Result → user-facing message converter.
 * Maps a command's Result to a level + human-readable one-liner for the CLI.
 */

import type { CommandName, CommandResult, Result } from "../types.js";

const ERROR_MESSAGES: Partial<Record<string, string>> = {
  GIT_UNAVAILABLE:    "Git is not available for this repository.",
  GIT_SYNC_ERROR:     "Pull failed.",
  LOG_PARSE_ERROR:    "Git history could not be read.",
  REVIEW_PASS_ERROR:  "Review pass failed.",
  CONFIG_EXISTS:      "A config already exists here.",
  CONFIG_NOT_FOUND:   "No config found. Run 'init' first.",
  HANDLER_NOT_FOUND:  "Command not recognized.",
};

/** Codes whose own message is appended to the generic text. */
const DETAILED_CODES: ReadonlySet<string> = new Set([
  "GIT_SYNC_ERROR",
  "LOG_PARSE_ERROR",
  "REVIEW_PASS_ERROR",
]);

const SUCCESS_MESSAGES: { [K in CommandName]: (value: CommandResult<K>) => string } = {
  "review.list": ({ details, commitCount, since }) =>
    `${details.length} change group(s) from ${commitCount} commit(s) since ${since}`,
  "review.show": ({ group }) =>
    `${group.filePath} by ${group.author}: ${group.commits.length} commit(s)`,
  "review.sync": ({ output }) =>
    `Synced: ${output.trim().split("\n")[0] || "up to date"}`,
  "review.markReviewed": ({ lastRun }) => `Marked reviewed at ${lastRun}`,
  "review.toggleSortOrder": ({ sortOrder }) => `Sort order is now ${sortOrder}`,
};

export interface UserMessage {
  level: "info" | "error";
  message: string;
}

export function formatResultMessage<K extends CommandName>(
  commandName: K,
  result: Result<CommandResult<K>>
): UserMessage {
  if (result.kind === "err") {
    const generic = ERROR_MESSAGES[result.error.code];
    let msg = generic ?? result.error.message;
    if (generic !== undefined && DETAILED_CODES.has(result.error.code)) {
      msg = `${generic} ${result.error.message}`;
    }
    return { level: "error", message: `[${commandName}] ${msg}` };
  }

  const describe = SUCCESS_MESSAGES[commandName];
  return { level: "info", message: describe(result.value) };
}
