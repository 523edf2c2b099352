import type { ChangeDetail, ChangeGroup, CommitRecord, SortOrder } from '../types/index.js';
import type { VcsGateway } from '../git/gateway.js';
import { parseLogOutput } from '../git/log.js';
import type { ITelemetry } from '../telemetry/index.js';
import { NullTelemetry } from '../telemetry/index.js';
import { TELEMETRY_RUN_ID_LENGTH } from '../settings/defaults.js';
import { generateId } from '../utils/index.js';
import { buildChangeEntries } from './indexer.js';
import type { DocumentPredicate } from './indexer.js';
import { groupChanges } from './grouper.js';
import { DiffReconstructor } from './diff/reconstructor.js';
import type { MergedDiffStrategy } from './diff/strategies.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ReviewPassOptions {
  gateway: VcsGateway;
  /** Start of the review window */
  since: Date;
  /** Ordered path rules, relative to the document root */
  rules?: readonly string[];
  isDocument?: DocumentPredicate;
  /** Merged-diff strategies in priority order. Defaults to ranged diff → head patch → synthesized. */
  strategies?: readonly MergedDiffStrategy[];
  telemetry?: ITelemetry;
}

export interface ReviewGrouping {
  runId: string;
  commits: CommitRecord[];
  groups: ChangeGroup[];
  entryCount: number;
}

export interface ReviewPassResult extends ReviewGrouping {
  details: ChangeDetail[];
  durationMs: number;
}

/** Where a pass was when it failed. */
export type ReviewStage = 'prefix' | 'log' | 'parse' | 'group' | 'diff';

/**
 * A pass aborted. `cause` is the original error; `stage` says which step
 * raised it.
 */
export class ReviewPassError extends Error {
  constructor(
    readonly stage: ReviewStage,
    cause: unknown,
  ) {
    super(`Review pass failed during ${stage}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'ReviewPassError';
  }
}

// ─── Implementation ─────────────────────────────────────────────────────────

/**
 * Run one aggregation pass: log → parse → filter → group → diff.
 *
 * Nothing is returned until every group is reconstructed. Any stage failure
 * aborts the whole pass with a {@link ReviewPassError}.
 */
export async function runReviewPass(options: ReviewPassOptions): Promise<ReviewPassResult> {
  const telemetry = options.telemetry ?? new NullTelemetry();
  const startedAt = Date.now();
  const runId = generateId(TELEMETRY_RUN_ID_LENGTH);

  telemetry.emit({
    kind: 'review.start',
    runId,
    since: options.since.toISOString(),
    timestamp: startedAt,
  });

  try {
    const grouping = await groupWindow(options, runId);
    const reconstructor = new DiffReconstructor(options.gateway, {
      strategies: options.strategies,
      onMergedDiff: (group, strategy) => {
        if (strategy === 'ranged-diff') return;
        telemetry.emit({
          kind: 'diff.fallback',
          runId,
          groupId: group.groupId,
          strategy: strategy ?? 'none',
          timestamp: Date.now(),
        });
      },
    });

    const details = await stage('diff', () => reconstructor.reconstructAll(grouping.groups));
    const durationMs = Date.now() - startedAt;

    telemetry.emit({
      kind: 'review.complete',
      runId,
      durationMs,
      commitCount: grouping.commits.length,
      entryCount: grouping.entryCount,
      groupCount: grouping.groups.length,
      timestamp: Date.now(),
    });

    return { ...grouping, details, durationMs };
  } catch (error) {
    const failure = error instanceof ReviewPassError ? error : new ReviewPassError('diff', error);
    telemetry.emit({
      kind: 'review.error',
      runId,
      stage: failure.stage,
      error: failure.message,
      durationMs: Date.now() - startedAt,
      timestamp: Date.now(),
    });
    throw failure;
  }
}

/**
 * The pass up to grouping, without any diff work.
 */
export async function collectChangeGroups(options: ReviewPassOptions): Promise<ReviewGrouping> {
  return groupWindow(options, generateId(TELEMETRY_RUN_ID_LENGTH));
}

/**
 * Reconstruct the single group with `groupId` in the window, or null when the
 * window has no such group.
 */
export async function findChangeDetail(
  options: ReviewPassOptions,
  groupId: string,
): Promise<ChangeDetail | null> {
  const { groups } = await collectChangeGroups(options);
  const group = groups.find((candidate) => candidate.groupId === groupId);
  if (!group) return null;

  const reconstructor = new DiffReconstructor(options.gateway, { strategies: options.strategies });
  return stage('diff', () => reconstructor.reconstruct(group));
}

/**
 * Order details for presentation. Passes yield newest-first.
 */
export function applySortOrder<T>(details: readonly T[], order: SortOrder): T[] {
  return order === 'oldest_first' ? [...details].reverse() : [...details];
}

// ─── Helpers ────────────────────────────────────────────────────────────────

async function groupWindow(options: ReviewPassOptions, runId: string): Promise<ReviewGrouping> {
  const { gateway, since, rules, isDocument } = options;

  const repoPrefix = await stage('prefix', () => gateway.repositoryRootPrefix());
  const rawLog = await stage('log', () => gateway.log(since));
  const commits = await stage('parse', async () => parseLogOutput(rawLog));

  return stage('group', async () => {
    const entries = buildChangeEntries(commits, { rules, repoPrefix, isDocument });
    return { runId, commits, groups: groupChanges(entries), entryCount: entries.length };
  });
}

async function stage<T>(name: ReviewStage, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw error instanceof ReviewPassError ? error : new ReviewPassError(name, error);
  }
}
