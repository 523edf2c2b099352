/**
 * Test Fixtures: Mocks and helpers shared by the host tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as nodePath from 'node:path';
import { FakeGateway } from '@doc-review/core/testing';
import type { ITelemetry, TelemetryEvent } from '@doc-review/core';
import type {
  AppError,
  CommandContext,
  Logger,
  Middleware,
  Result,
} from '../src/types.js';

// ============================================================================
// Mock Logger
// ============================================================================

export class MockLogger implements Logger {
  logs: Array<{ level: string; message: string; context?: string; data?: unknown }> = [];

  debug(message: string, context?: string, data?: unknown): void {
    this.logs.push({ level: 'debug', message, context, data });
  }

  info(message: string, context?: string, data?: unknown): void {
    this.logs.push({ level: 'info', message, context, data });
  }

  warn(message: string, context?: string, error?: AppError): void {
    this.logs.push({ level: 'warn', message, context, data: error });
  }

  error(message: string, context?: string, error?: AppError): void {
    this.logs.push({ level: 'error', message, context, data: error });
  }

  clear(): void {
    this.logs = [];
  }

  getByLevel(level: string): typeof this.logs {
    return this.logs.filter((log) => log.level === level);
  }
}

// ============================================================================
// Mock Telemetry
// ============================================================================

export class RecordingTelemetry implements ITelemetry {
  events: TelemetryEvent[] = [];
  disposed = false;

  emit(event: TelemetryEvent): void {
    this.events.push(event);
  }

  dispose(): void {
    this.disposed = true;
  }
}

// ============================================================================
// Test Data
// ============================================================================

/** Wednesday 2026-10-14, 12:00 UTC */
export const FIXED_NOW = new Date('2026-10-14T12:00:00Z');

export const LAST_RUN = '2026-10-10T09:00:00.000Z';

export function createMockContext(workspaceRoot = '/home/user/notes'): CommandContext {
  return { workspaceRoot };
}

/**
 * Two groups by Ada (guide.md twice, intro.md once) and one by Grace.
 * Newest first, as git log prints them.
 */
export function createScriptedGateway(): FakeGateway {
  const gateway = new FakeGateway();
  gateway.setCommits([
    { hash: 'c4', author: 'Grace', date: '2026-10-13T16:00:00Z', subject: 'Fix typo', files: ['guide.md'], parent: 'c3' },
    { hash: 'c3', author: 'Ada', date: '2026-10-13T10:00:00Z', subject: 'Expand guide', files: ['guide.md', 'build.ts'], parent: 'c2' },
    { hash: 'c2', author: 'Ada', date: '2026-10-12T10:00:00Z', subject: 'Add intro', files: ['intro.md'], parent: 'c1' },
    { hash: 'c1', author: 'Ada', date: '2026-10-11T10:00:00Z', subject: 'Start guide', files: ['guide.md'], parent: 'c0' },
  ]);
  gateway.rangedDiffs.set('c0..c3:guide.md', 'guide merged');
  gateway.rangedDiffs.set('c1..c2:intro.md', 'intro merged');
  gateway.rangedDiffs.set('c3..c4:guide.md', 'typo merged');
  return gateway;
}

// ============================================================================
// Temporary workspace
// ============================================================================

export interface TempWorkspace {
  root: string;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(): Promise<TempWorkspace> {
  const root = await mkdtemp(nodePath.join(tmpdir(), 'doc-review-'));
  return {
    root,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a mock middleware for testing command router
 */
export function createMockMiddleware(onCall: (name: string) => void = () => {}): Middleware {
  return async (ctx, next) => {
    onCall(ctx.commandName);
    await next();
  };
}

/**
 * Assert Result is success
 */
export function assertSuccess<T>(result: Result<T>): T {
  if (result.kind === 'err') {
    throw new Error(`Expected success but got error: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Assert Result is failure
 */
export function assertFailure<T>(result: Result<T>): AppError {
  if (result.kind === 'ok') {
    throw new Error(`Expected failure but got success: ${JSON.stringify(result.value)}`);
  }
  return result.error;
}
