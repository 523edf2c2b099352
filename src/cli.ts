/**
 * Command-line host: builds the router, registers the review domain and
 * maps subcommands onto routed commands.
 *
 * Exit codes: 0 = success, 1 = command failed, 2 = usage error.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { GitGateway, readRawSettings } from "@doc-review/core";
import type { ITelemetry, RawSettings, VcsGateway } from "@doc-review/core";
import { CommandRouter } from "./router.js";
import { success, failure } from "./types.js";
import type { CommandContext, CommandName, CommandParams, CommandResult, Result } from "./types.js";
import { ConfigStore } from "./infrastructure/config.js";
import { Logger, createStreamSink } from "./infrastructure/logger.js";
import { SqliteTelemetry } from "./infrastructure/telemetry-store.js";
import { INFRASTRUCTURE_ERROR_CODES } from "./infrastructure/error-codes.js";
import { formatResultMessage } from "./infrastructure/result-handler.js";
import { createAuditMiddleware, createLoggingMiddleware } from "./cross-cutting/middleware.js";
import { createReviewDomain } from "./domains/review/service.js";
import { renderDetail, renderJson, renderListing } from "./ui/render.js";

/** Buffered log entries replayed to stderr when a command fails */
const FAILURE_LOG_ENTRIES = 50;

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export interface CliOptions {
  /** Directory holding `.doc-review/` */
  workspaceRoot: string;
  io: CliIo;
  gatewayFor?: (documentRoot: string) => VcsGateway;
  clock?: () => Date;
  /** Replaces the database under the config folder */
  telemetry?: ITelemetry;
}

// ============================================================================
// Application wiring
// ============================================================================

export interface App {
  router: CommandRouter;
  logger: Logger;
  context: CommandContext;
  close(): Promise<void>;
}

/**
 * Load the config, wire telemetry, middleware and the review domain.
 * Fails when the config is missing or invalid.
 */
export async function createApp(options: CliOptions, logger: Logger): Promise<Result<App>> {
  const config = new ConfigStore(options.workspaceRoot, logger);
  const loaded = await config.load();
  if (loaded.kind === "err") {
    return loaded;
  }
  logger.setThreshold(loaded.value.settings.logLevel);

  const telemetry = options.telemetry ?? new SqliteTelemetry(config.telemetryPath, logger);
  const router = new CommandRouter(logger);
  router.use(createLoggingMiddleware(logger));
  router.use(createAuditMiddleware(logger));
  router.registerDomain(
    createReviewDomain({
      config,
      gatewayFor: options.gatewayFor ?? ((root) => new GitGateway(root)),
      logger,
      telemetry,
      clock: options.clock,
    })
  );

  const context: CommandContext = { workspaceRoot: options.workspaceRoot };
  const validated = await router.validateDomains(context);
  if (validated.kind === "err") {
    await router.teardown();
    telemetry.dispose();
    return validated;
  }

  return success({
    router,
    logger,
    context,
    close: async () => {
      await router.teardown();
      telemetry.dispose();
    },
  });
}

// ============================================================================
// Program
// ============================================================================

interface ViewOptions {
  weeksBack?: number;
  json?: boolean;
  split?: boolean;
}

interface InitOptions {
  repoPath?: string;
  weekday?: string;
  time?: string;
}

/**
 * Create and configure the CLI program. `state.exitCode` receives each
 * action's outcome.
 */
export function createProgram(options: CliOptions, state: { exitCode: number }): Command {
  const { io } = options;
  const logger = new Logger({ sink: createStreamSink({ write: io.err }) });

  const program = new Command();
  program
    .name("doc-review")
    .description("Group recent document changes into per-author review units")
    .version("0.1.0")
    .configureOutput({ writeOut: io.out, writeErr: io.err })
    .exitOverride();

  /** Run one routed command and report its outcome. */
  async function run<K extends CommandName>(
    name: K,
    params: CommandParams<K>,
    render?: (value: CommandResult<K>) => string
  ): Promise<void> {
    const app = await createApp(options, logger);
    if (app.kind === "err") {
      logger.replayHeldBack(FAILURE_LOG_ENTRIES);
      io.err(`Error: ${app.error.message}\n`);
      state.exitCode = 1;
      return;
    }

    try {
      const result = await app.value.router.dispatch({ name, params }, app.value.context);
      const message = formatResultMessage(name, result);
      if (result.kind === "ok" && render) {
        io.out(render(result.value));
      }
      if (message.level === "error") {
        logger.replayHeldBack(FAILURE_LOG_ENTRIES);
      }
      // stdout carries only rendered results
      io.err(`${message.message}\n`);
      state.exitCode = message.level === "error" ? 1 : 0;
    } finally {
      await app.value.close();
    }
  }

  program
    .command("init")
    .description("Write .doc-review/config.json in the current directory")
    .option("--repo-path <path>", "document root, relative to this directory")
    .option("--weekday <day>", "weekday the default review window starts on")
    .option("--time <HH:MM>", "local time paired with --weekday")
    .action(async (opts: InitOptions) => {
      const overrides = parseInitOptions(opts);
      if (overrides.kind === "err") {
        io.err(`Error: ${overrides.error.message}\n`);
        state.exitCode = 1;
        return;
      }

      const config = new ConfigStore(options.workspaceRoot, logger);
      const written = await config.init(overrides.value);
      if (written.kind === "err") {
        io.err(`Error: ${written.error.message}\n`);
        state.exitCode = 1;
        return;
      }
      io.out(`Wrote ${config.configPath}\n`);
      state.exitCode = 0;
    });

  program
    .command("list")
    .description("Show every change group in the review window")
    .option("-w, --weeks-back <n>", "move the window start back by whole weeks", parseWeeks)
    .option("--json", "print machine-readable JSON")
    .option("--split", "show each commit's own patch instead of the merged diff")
    .action(async (opts: ViewOptions) => {
      await run("review.list", { weeksBack: opts.weeksBack }, (listing) =>
        opts.json ? renderJson(listing) : renderListing(listing, { split: opts.split })
      );
    });

  program
    .command("show <groupId>")
    .description("Show one change group by id")
    .option("-w, --weeks-back <n>", "move the window start back by whole weeks", parseWeeks)
    .option("--json", "print machine-readable JSON")
    .option("--split", "show each commit's own patch instead of the merged diff")
    .action(async (groupId: string, opts: ViewOptions) => {
      await run("review.show", { groupId, weeksBack: opts.weeksBack }, (detail) =>
        opts.json ? renderJson(detail) : renderDetail(detail, { split: opts.split })
      );
    });

  program
    .command("sync")
    .description("Pull the document repository")
    .action(async () => {
      await run("review.sync", {});
    });

  program
    .command("mark-reviewed")
    .description("Record now as the end of the last review")
    .action(async () => {
      await run("review.markReviewed", {});
    });

  program
    .command("toggle-sort")
    .description("Switch between newest-first and oldest-first")
    .action(async () => {
      await run("review.toggleSortOrder", {});
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 * Resolves to the exit code.
 */
export async function runCli(argv: string[], options: CliOptions): Promise<number> {
  const state = { exitCode: 0 };
  const program = createProgram(options, state);
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version exit with 0
      return err.exitCode === 0 ? 0 : 2;
    }
    throw err;
  }
  return state.exitCode;
}

// ============================================================================
// Option parsing
// ============================================================================

function parseWeeks(value: string): number {
  const weeks = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(weeks)) {
    throw new InvalidArgumentError("Expected a non-negative whole number.");
  }
  return weeks;
}

function parseInitOptions(opts: InitOptions): Result<RawSettings> {
  const json: Record<string, string> = {};
  if (opts.repoPath !== undefined) json.repoPath = opts.repoPath;
  if (opts.weekday !== undefined) json.defaultWeekday = opts.weekday;
  if (opts.time !== undefined) json.defaultTime = opts.time;

  const { raw, errors } = readRawSettings(json);
  if (errors.length > 0) {
    return failure({
      code: INFRASTRUCTURE_ERROR_CODES.CONFIG_INVALID,
      message: errors.join("; "),
      context: "init",
    });
  }
  return success(raw);
}
