/**
 * Cross-cutting middleware for logging and auditing.
 * Declaratively applied to all commands.
 */

import type { AppError, CommandName, Logger, Middleware, MiddlewareContext } from "../types.js";
import { ROUTER_ERROR_CODES } from "../infrastructure/error-codes.js";

/** Commands that change the repository or the stored config. */
export const AUDITED_COMMANDS: readonly CommandName[] = [
  "review.sync",
  "review.markReviewed",
  "review.toggleSortOrder",
];

/**
 * Logging middleware: tracks command execution time and outcomes.
 */
export function createLoggingMiddleware(logger: Logger): Middleware {
  return async (ctx: MiddlewareContext, next: () => Promise<void>) => {
    logger.debug(
      `[${ctx.commandName}] Starting execution`,
      "LoggingMiddleware",
      { commandName: ctx.commandName }
    );

    const start = Date.now();
    try {
      await next();
      const duration = Date.now() - start;
      logger.debug(
        `[${ctx.commandName}] Middleware chain completed in ${duration}ms`,
        "LoggingMiddleware",
        { commandName: ctx.commandName, duration }
      );
    } catch (err) {
      const duration = Date.now() - start;
      const error: AppError = {
        code: ROUTER_ERROR_CODES.MIDDLEWARE_ERROR,
        message: "Command execution failed",
        details: err,
        context: ctx.commandName,
      };
      logger.error(
        `[${ctx.commandName}] Failed after ${duration}ms`,
        "LoggingMiddleware",
        error
      );
      throw err;
    }
  };
}

/**
 * Audit middleware: records commands with side effects.
 */
export function createAuditMiddleware(
  logger: Logger,
  audited: readonly CommandName[] = AUDITED_COMMANDS
): Middleware {
  return async (ctx: MiddlewareContext, next: () => Promise<void>) => {
    if (audited.includes(ctx.commandName)) {
      logger.info(
        `[AUDIT] Command invoked: ${ctx.commandName}`,
        "AuditMiddleware",
        { commandName: ctx.commandName, timestamp: new Date(ctx.startTime).toISOString() }
      );
    }

    await next();
  };
}
