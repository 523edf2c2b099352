/**
 * Review Domain Handlers: validate params, delegate to the service,
 * convert anything thrown into a Result.
 */

import { failure } from "../../types.js";
import type { AppError, CommandContext, Handler, Logger, Result } from "../../types.js";
import { GENERIC_ERROR_CODES } from "../../infrastructure/error-codes.js";
import type { ReviewService } from "./service.js";
import type { ListParams, ShowParams } from "./types.js";

/**
 * review.list: Read-only aggregation pass over the review window.
 */
export function createListHandler(
  service: ReviewService,
  logger: Logger
): Handler<"review.list"> {
  return async (_ctx: CommandContext, params: ListParams) => {
    const invalid = checkWeeksBack(params.weeksBack, "review.list");
    if (invalid) {
      return failure(invalid);
    }

    logger.debug(
      `Listing changes (weeks back: ${params.weeksBack ?? 0})`,
      "ReviewListHandler"
    );
    return guard("review.list", () => service.list(params.weeksBack));
  };
}

/**
 * review.show: One group's contents and diffs.
 */
export function createShowHandler(
  service: ReviewService,
  logger: Logger
): Handler<"review.show"> {
  return async (_ctx: CommandContext, params: ShowParams) => {
    if (typeof params.groupId !== "string" || params.groupId.trim() === "") {
      return failure({
        code: GENERIC_ERROR_CODES.INVALID_PARAMS,
        message: "groupId must be a non-empty string",
        context: "review.show",
      });
    }
    const invalid = checkWeeksBack(params.weeksBack, "review.show");
    if (invalid) {
      return failure(invalid);
    }

    logger.debug(`Showing group ${params.groupId}`, "ReviewShowHandler");
    return guard("review.show", () => service.show(params.groupId, params.weeksBack));
  };
}

/**
 * review.sync: Mutation: pulls the document repository.
 */
export function createSyncHandler(
  service: ReviewService,
  logger: Logger
): Handler<"review.sync"> {
  return async () => {
    logger.info("Syncing document repository", "ReviewSyncHandler");
    return guard("review.sync", () => service.sync());
  };
}

/**
 * review.markReviewed: Mutation: stores now as the last review.
 */
export function createMarkReviewedHandler(
  service: ReviewService,
  logger: Logger
): Handler<"review.markReviewed"> {
  return async () => {
    logger.debug("Marking review complete", "ReviewMarkReviewedHandler");
    return guard("review.markReviewed", () => service.markReviewed());
  };
}

/**
 * review.toggleSortOrder: Mutation: flips the presentation order.
 */
export function createToggleSortOrderHandler(
  service: ReviewService,
  logger: Logger
): Handler<"review.toggleSortOrder"> {
  return async () => {
    logger.debug("Toggling sort order", "ReviewToggleSortOrderHandler");
    return guard("review.toggleSortOrder", () => service.toggleSortOrder());
  };
}

// ============================================================================
// Helpers
// ============================================================================

function checkWeeksBack(weeksBack: unknown, context: string): AppError | null {
  if (weeksBack === undefined) {
    return null;
  }
  if (typeof weeksBack !== "number" || !Number.isInteger(weeksBack) || weeksBack < 0) {
    return {
      code: GENERIC_ERROR_CODES.INVALID_PARAMS,
      message: "weeksBack must be a non-negative integer",
      context,
    };
  }
  return null;
}

async function guard<T>(
  context: string,
  run: () => Promise<Result<T>>
): Promise<Result<T>> {
  try {
    return await run();
  } catch (err) {
    return failure({
      code: GENERIC_ERROR_CODES.UNKNOWN_ERROR,
      message: err instanceof Error ? err.message : String(err),
      details: err,
      context,
    });
  }
}
