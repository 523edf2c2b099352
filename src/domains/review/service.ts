/**
 * Review Domain Service: runs aggregation passes against the configured
 * repository and keeps the review bookkeeping in the config store.
 */

import {
  GitUnavailableError,
  LogParseError,
  NullTelemetry,
  ReviewPassError,
  applySortOrder,
  findChangeDetail,
  hasDocumentExtension,
  resolveReviewSince,
  runReviewPass,
} from "@doc-review/core";
import type { ChangeDetail, ITelemetry, ReviewPassOptions, SortOrder, VcsGateway } from "@doc-review/core";
import { failure, success } from "../../types.js";
import type {
  AppError,
  CommandContext,
  DomainService,
  HandlerRegistry,
  Logger,
  Result,
} from "../../types.js";
import type { ConfigStore, LoadedConfig } from "../../infrastructure/config.js";
import { REVIEW_ERROR_CODES } from "../../infrastructure/error-codes.js";
import {
  createListHandler,
  createMarkReviewedHandler,
  createShowHandler,
  createSyncHandler,
  createToggleSortOrderHandler,
} from "./handlers.js";
import type { ReviewListing, SyncOutcome } from "./types.js";

export interface ReviewServiceDeps {
  config: ConfigStore;
  /** Gateway over the document root */
  gatewayFor: (documentRoot: string) => VcsGateway;
  logger: Logger;
  telemetry?: ITelemetry;
  clock?: () => Date;
}

// ============================================================================
// Review Service
// ============================================================================

export class ReviewService {
  private readonly config: ConfigStore;
  private readonly gatewayFor: (documentRoot: string) => VcsGateway;
  private readonly logger: Logger;
  private readonly telemetry: ITelemetry;
  private readonly clock: () => Date;

  constructor(deps: ReviewServiceDeps) {
    this.config = deps.config;
    this.gatewayFor = deps.gatewayFor;
    this.logger = deps.logger;
    this.telemetry = deps.telemetry ?? new NullTelemetry();
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Aggregate the review window and reconstruct every group.
   */
  async list(weeksBack = 0): Promise<Result<ReviewListing>> {
    const loaded = await this.config.load();
    if (loaded.kind === "err") {
      return loaded;
    }

    const options = this.passOptions(loaded.value, weeksBack);
    try {
      const pass = await runReviewPass(options);
      const { sortOrder } = loaded.value.settings;
      this.logger.info(
        `Found ${pass.groups.length} change group(s) in ${pass.commits.length} commit(s) since ${options.since.toISOString()}`,
        "ReviewService.list"
      );
      return success({
        runId: pass.runId,
        since: options.since.toISOString(),
        sortOrder,
        commitCount: pass.commits.length,
        details: applySortOrder(pass.details, sortOrder),
      });
    } catch (err) {
      return failure(describeReviewFailure(err, "review.list"));
    }
  }

  /**
   * Reconstruct one group of the window by id.
   */
  async show(groupId: string, weeksBack = 0): Promise<Result<ChangeDetail>> {
    const loaded = await this.config.load();
    if (loaded.kind === "err") {
      return loaded;
    }

    try {
      const detail = await findChangeDetail(this.passOptions(loaded.value, weeksBack), groupId);
      if (!detail) {
        return failure({
          code: REVIEW_ERROR_CODES.GROUP_NOT_FOUND,
          message: `No change group '${groupId}' in the review window`,
          context: "review.show",
        });
      }
      return success(detail);
    } catch (err) {
      return failure(describeReviewFailure(err, "review.show"));
    }
  }

  /**
   * Pull the document repository. Nothing else happens in the same call.
   */
  async sync(): Promise<Result<SyncOutcome>> {
    const loaded = await this.config.load();
    if (loaded.kind === "err") {
      return loaded;
    }

    const start = Date.now();
    try {
      const output = await this.gatewayFor(loaded.value.documentRoot).sync();
      const durationMs = Date.now() - start;
      this.telemetry.emit({ kind: "sync.complete", durationMs, timestamp: Date.now() });
      this.logger.info(`Synced in ${durationMs}ms`, "ReviewService.sync");
      return success({ output, durationMs });
    } catch (err) {
      if (err instanceof GitUnavailableError) {
        return failure(describeReviewFailure(err, "review.sync"));
      }
      return failure({
        code: REVIEW_ERROR_CODES.GIT_SYNC_ERROR,
        message: err instanceof Error ? err.message : String(err),
        details: err,
        context: "review.sync",
      });
    }
  }

  /**
   * Store the current time as the end of the last review.
   */
  async markReviewed(): Promise<Result<{ lastRun: string }>> {
    const saved = await this.config.saveLastRun(this.clock());
    if (saved.kind === "err") {
      return saved;
    }
    this.logger.info(`Marked reviewed at ${saved.value}`, "ReviewService.markReviewed");
    return success({ lastRun: saved.value });
  }

  async toggleSortOrder(): Promise<Result<{ sortOrder: SortOrder }>> {
    const loaded = await this.config.load();
    if (loaded.kind === "err") {
      return loaded;
    }

    const next: SortOrder =
      loaded.value.settings.sortOrder === "newest_first" ? "oldest_first" : "newest_first";
    const saved = await this.config.saveSortOrder(next);
    if (saved.kind === "err") {
      return saved;
    }
    return success({ sortOrder: saved.value });
  }

  /**
   * Check that the config loads and its document root is inside a git
   * repository before any command runs.
   */
  async verifyWorkspace(): Promise<Result<LoadedConfig>> {
    const loaded = await this.config.load();
    if (loaded.kind === "err") {
      return loaded;
    }

    const { documentRoot } = loaded.value;
    try {
      if (!(await this.gatewayFor(documentRoot).isRepository())) {
        return failure({
          code: REVIEW_ERROR_CODES.GIT_UNAVAILABLE,
          message: `Not a git repository: ${documentRoot}`,
          details: { documentRoot },
        });
      }
    } catch (err) {
      return failure(describeReviewFailure(err, "review.verify"));
    }
    return loaded;
  }

  private passOptions({ settings, documentRoot }: LoadedConfig, weeksBack: number): ReviewPassOptions {
    return {
      gateway: this.gatewayFor(documentRoot),
      since: resolveReviewSince(settings, this.clock(), weeksBack),
      rules: settings.pathFilters,
      isDocument: hasDocumentExtension(settings.documentExtensions),
      telemetry: this.telemetry,
    };
  }
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Turn a pass or gateway failure into an {@link AppError}. `context` names
 * the command and stage; `details` carries what the failing step was given.
 */
export function describeReviewFailure(err: unknown, command: string): AppError {
  const stage = err instanceof ReviewPassError ? err.stage : undefined;
  const cause = err instanceof ReviewPassError ? err.cause : err;
  const context = stage ? `${command}:${stage}` : command;

  if (cause instanceof GitUnavailableError) {
    return {
      code: REVIEW_ERROR_CODES.GIT_UNAVAILABLE,
      message: cause.message,
      details: { stage, args: cause.args },
      context,
    };
  }

  if (cause instanceof LogParseError) {
    return {
      code: REVIEW_ERROR_CODES.LOG_PARSE_ERROR,
      message: cause.message,
      details: { stage, commit: cause.commit, value: cause.rawValue },
      context,
    };
  }

  return {
    code: REVIEW_ERROR_CODES.REVIEW_PASS_ERROR,
    message: err instanceof Error ? err.message : String(err),
    details: { stage, cause },
    context,
  };
}

// ============================================================================
// Domain Service
// ============================================================================

export class ReviewDomainService implements DomainService {
  readonly name = "review";

  handlers: HandlerRegistry;

  constructor(
    private readonly service: ReviewService,
    private readonly logger: Logger
  ) {
    this.handlers = {
      "review.list": createListHandler(service, logger),
      "review.show": createShowHandler(service, logger),
      "review.sync": createSyncHandler(service, logger),
      "review.markReviewed": createMarkReviewedHandler(service, logger),
      "review.toggleSortOrder": createToggleSortOrderHandler(service, logger),
    };
  }

  /**
   * Initialize domain: the config must exist and be valid, and point at a
   * git repository.
   */
  async initialize(ctx: CommandContext): Promise<Result<void>> {
    this.logger.debug(`Initializing review domain in ${ctx.workspaceRoot}`, "ReviewDomainService.initialize");
    const loaded = await this.service.verifyWorkspace();
    if (loaded.kind === "err") {
      return failure({ ...loaded.error, context: "ReviewDomainService.initialize" });
    }
    this.logger.debug(
      `Document root: ${loaded.value.documentRoot}`,
      "ReviewDomainService.initialize"
    );
    return success(undefined);
  }

  async teardown(): Promise<void> {
    this.logger.debug("Tearing down review domain", "ReviewDomainService.teardown");
  }
}

/**
 * Factory function: creates and returns the review domain service.
 */
export function createReviewDomain(deps: ReviewServiceDeps): ReviewDomainService {
  return new ReviewDomainService(new ReviewService(deps), deps.logger);
}
