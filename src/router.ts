/**
 * Command Router: registry pattern.
 * Routes commands to handlers with middleware support.
 */

import {
  COMMAND_NAMES,
  failure,
  success,
} from "./types.js";
import type {
  AppError,
  Command,
  CommandContext,
  CommandName,
  CommandResult,
  DomainService,
  Handler,
  HandlerRegistry,
  Logger,
  Middleware,
  MiddlewareContext,
  Result,
} from "./types.js";
import { ROUTER_ERROR_CODES } from "./infrastructure/error-codes.js";

export class CommandRouter {
  private handlers: HandlerRegistry = {};
  private middlewares: Middleware[] = [];
  private logger: Logger;
  private domains: Map<string, DomainService> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Register handlers from a domain service.
   * Validates command names upfront, no late binding.
   */
  registerDomain(domain: DomainService): void {
    if (this.domains.has(domain.name)) {
      this.logger.warn(
        `Domain '${domain.name}' already registered, skipping`,
        "CommandRouter.registerDomain"
      );
      return;
    }

    const claimed = COMMAND_NAMES.filter((name) => domain.handlers[name] !== undefined);
    for (const name of claimed) {
      if (this.handlers[name]) {
        const err: AppError = {
          code: ROUTER_ERROR_CODES.HANDLER_CONFLICT,
          message: `Handler '${name}' already registered`,
          context: "CommandRouter.registerDomain",
        };
        this.logger.error(
          `Cannot register '${name}': handler conflict`,
          "CommandRouter.registerDomain",
          err
        );
        throw err;
      }
    }

    for (const name of claimed) {
      this.adopt(name, domain.handlers);
    }

    this.domains.set(domain.name, domain);
    this.logger.info(
      `Registered ${claimed.length} handlers from domain '${domain.name}'`,
      "CommandRouter.registerDomain"
    );
  }

  /**
   * Register a middleware for cross-cutting concerns.
   * Executed in order before handler dispatch.
   */
  use(middleware: Middleware): void {
    this.middlewares.push(middleware);
  }

  /**
   * Dispatch a command through the middleware chain to its handler.
   * Returns Result monad: no exceptions thrown.
   */
  async dispatch<K extends CommandName>(
    command: Command<K>,
    context: CommandContext
  ): Promise<Result<CommandResult<K>>> {
    const handler: Handler<K> | undefined = this.handlers[command.name];

    if (!handler) {
      const err: AppError = {
        code: ROUTER_ERROR_CODES.HANDLER_NOT_FOUND,
        message: `No handler registered for command '${command.name}'`,
        context: command.name,
      };
      this.logger.warn(
        `Command not found: ${command.name}`,
        "CommandRouter.dispatch",
        err
      );
      return failure(err);
    }

    const mwCtx: MiddlewareContext = {
      commandName: command.name,
      startTime: Date.now(),
    };

    try {
      await this.executeMiddlewares(mwCtx, 0);
    } catch (mwErr) {
      const err: AppError = {
        code: ROUTER_ERROR_CODES.MIDDLEWARE_ERROR,
        message: `Middleware execution failed for '${command.name}'`,
        details: mwErr,
        context: "CommandRouter.dispatch",
      };
      this.logger.error(
        `Middleware failed: ${command.name}`,
        "CommandRouter.dispatch",
        err
      );
      return failure(err);
    }

    try {
      const result = await handler(context, command.params);
      const duration = Date.now() - mwCtx.startTime;
      this.logger.info(
        `Command '${command.name}' executed in ${duration}ms`,
        "CommandRouter.dispatch"
      );
      return result;
    } catch (handlerErr) {
      const err: AppError = {
        code: ROUTER_ERROR_CODES.HANDLER_ERROR,
        message: `Handler for '${command.name}' threw an exception`,
        details: handlerErr,
        context: command.name,
      };
      this.logger.error(
        `Handler error: ${command.name}`,
        "CommandRouter.dispatch",
        err
      );
      return failure(err);
    }
  }

  /**
   * List registered command names.
   */
  listCommands(): CommandName[] {
    return COMMAND_NAMES.filter((name) => this.handlers[name] !== undefined);
  }

  /**
   * List registered domains.
   */
  listDomains(): string[] {
    return Array.from(this.domains.keys());
  }

  /**
   * Run every domain's initialization; collects all failures.
   */
  async validateDomains(ctx: CommandContext): Promise<Result<void>> {
    const errors: string[] = [];
    const causes: AppError[] = [];

    for (const [domainName, domain] of this.domains) {
      if (domain.initialize) {
        const initResult = await domain.initialize(ctx);
        if (initResult.kind === "err") {
          errors.push(
            `Domain '${domainName}' initialization failed: ${initResult.error.message}`
          );
          causes.push(initResult.error);
        }
      }
    }

    if (errors.length > 0) {
      const err: AppError = {
        code: ROUTER_ERROR_CODES.VALIDATION_ERROR,
        message: errors.join("; "),
        details: causes,
        context: "CommandRouter.validateDomains",
      };
      this.logger.error(
        `Domain validation failed: ${errors.length} errors`,
        "CommandRouter.validateDomains",
        err
      );
      return failure(err);
    }

    this.logger.info(
      `All ${this.domains.size} domains validated successfully`,
      "CommandRouter.validateDomains"
    );
    return success(undefined);
  }

  /**
   * Cleanup: call teardown on all domains in reverse order.
   */
  async teardown(): Promise<void> {
    const domains = Array.from(this.domains.values()).reverse();
    for (const domain of domains) {
      if (domain.teardown) {
        try {
          await domain.teardown();
        } catch (err) {
          this.logger.warn(
            `Domain '${domain.name}' teardown threw: ${err instanceof Error ? err.message : String(err)}`,
            "CommandRouter.teardown"
          );
        }
      }
    }
    this.logger.info("Router teardown complete", "CommandRouter.teardown");
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private adopt<K extends CommandName>(name: K, handlers: HandlerRegistry): void {
    const handler = handlers[name];
    if (handler) {
      this.handlers[name] = handler;
    }
  }

  private async executeMiddlewares(
    ctx: MiddlewareContext,
    index: number
  ): Promise<void> {
    if (index >= this.middlewares.length) {
      return;
    }

    const middleware = this.middlewares[index];
    await middleware(ctx, () => this.executeMiddlewares(ctx, index + 1));
  }
}
