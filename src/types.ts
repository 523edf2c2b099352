/**
 * Core type definitions for the command router.
 * Commands, handlers and the Result type shared by every layer.
 */

import type { ChangeDetail, SortOrder } from "@doc-review/core";
import type {
  ListParams,
  ReviewListing,
  ShowParams,
  SyncOutcome,
} from "./domains/review/types.js";

// ============================================================================
// Result Monad: Either<Error, Success>
// ============================================================================

export type Result<T> =
  | { kind: "ok"; value: T }
  | { kind: "err"; error: AppError };

export function success<T>(value: T): Result<T> {
  return { kind: "ok", value };
}

export function failure<T>(error: AppError): Result<T> {
  return { kind: "err", error };
}

export interface AppError {
  code: string;
  message: string;
  details?: unknown;
  context?: string;
}

// ============================================================================
// Commands
// ============================================================================

export interface CommandContext {
  /** Directory holding `.doc-review/` */
  workspaceRoot: string;
}

export type EmptyParams = Record<string, never>;

/**
 * Every command with the params it takes and the value it yields.
 */
export interface CommandMap {
  "review.list": { params: ListParams; result: ReviewListing };
  "review.show": { params: ShowParams; result: ChangeDetail };
  "review.sync": { params: EmptyParams; result: SyncOutcome };
  "review.markReviewed": { params: EmptyParams; result: { lastRun: string } };
  "review.toggleSortOrder": { params: EmptyParams; result: { sortOrder: SortOrder } };
}

export type CommandName = keyof CommandMap;
export type CommandParams<K extends CommandName> = CommandMap[K]["params"];
export type CommandResult<K extends CommandName> = CommandMap[K]["result"];

export const COMMAND_NAMES: readonly CommandName[] = [
  "review.list",
  "review.show",
  "review.sync",
  "review.markReviewed",
  "review.toggleSortOrder",
];

export interface Command<K extends CommandName = CommandName> {
  name: K;
  params: CommandParams<K>;
}

// ============================================================================
// Handler Interface (registry pattern)
// ============================================================================

export type Handler<K extends CommandName> = (
  ctx: CommandContext,
  params: CommandParams<K>
) => Promise<Result<CommandResult<K>>>;

export type HandlerRegistry = { [K in CommandName]?: Handler<K> };

// ============================================================================
// Domain Service Interface
// ============================================================================

export interface DomainService {
  name: string;
  handlers: HandlerRegistry;
  initialize?(ctx: CommandContext): Promise<Result<void>>;
  teardown?(): Promise<void>;
}

// ============================================================================
// Infrastructure Providers
// ============================================================================

export interface Logger {
  debug(message: string, context?: string, data?: unknown): void;
  info(message: string, context?: string, data?: unknown): void;
  warn(message: string, context?: string, error?: AppError): void;
  error(message: string, context?: string, error?: AppError): void;
}

// ============================================================================
// Cross-Cutting Concerns
// ============================================================================

export interface MiddlewareContext {
  commandName: CommandName;
  startTime: number;
}

export type Middleware = (
  ctx: MiddlewareContext,
  next: () => Promise<void>
) => Promise<void>;
