import { describe, it, expect } from 'vitest';
import { DiffReconstructor } from './reconstructor.js';
import { FAKE_EMPTY_TREE, FakeGateway } from '../../testing/fake-gateway.js';
import type { ChangeGroup } from '../../types/index.js';

function group(filePath: string, commits: string[]): ChangeGroup {
  return {
    groupId: `${filePath}|${commits[0]}`,
    filePath,
    author: 'Ada',
    newestCommit: commits[0],
    oldestCommit: commits[commits.length - 1],
    newestDate: new Date('2026-10-15T08:00:00Z'),
    oldestDate: new Date('2026-10-13T08:00:00Z'),
    subjects: commits.map((c) => `Subject ${c}`),
    commits,
  };
}

describe('DiffReconstructor', () => {
  it('diffs from the parent of the oldest commit to the newest commit', async () => {
    const gateway = new FakeGateway();
    gateway.parents.set('c3', 'p0');
    gateway.setFile('p0', 'x.md', 'v0\n');
    gateway.setFile('c1', 'x.md', 'v2\n');
    gateway.rangedDiffs.set('p0..c1:x.md', 'merged diff');
    gateway.fullPatches.set('c1', 'diff --git a/x.md b/x.md\n+c1\n');
    gateway.fullPatches.set('c3', 'diff --git a/y.md b/y.md\n+y\ndiff --git a/x.md b/x.md\n+c3\n');

    const detail = await new DiffReconstructor(gateway).reconstruct(group('x.md', ['c1', 'c3']));

    expect(detail.baseContent).toBe('v0\n');
    expect(detail.headContent).toBe('v2\n');
    expect(detail.diffText).toBe('merged diff');
    expect(detail.splitDiffText).toBe('diff --git a/x.md b/x.md\n+c1\n\ndiff --git a/x.md b/x.md\n+c3\n');
  });

  it('uses the empty tree as base for a root commit', async () => {
    const gateway = new FakeGateway();
    gateway.setFile('c1', 'new.md', 'hello\n');
    gateway.rangedDiffs.set(`${FAKE_EMPTY_TREE}..c1:new.md`, 'creation diff');

    const detail = await new DiffReconstructor(gateway).reconstruct(group('new.md', ['c1']));

    expect(detail.baseContent).toBe('');
    expect(detail.headContent).toBe('hello\n');
    expect(detail.diffText).toBe('creation diff');
    expect(gateway.calls).toContain('emptyTree()');
  });

  it('synthesizes a creation diff for a root commit when git returns no diff', async () => {
    const gateway = new FakeGateway();
    gateway.setFile('c1', 'new.md', 'hello\n');
    const seen: (string | null)[] = [];

    const detail = await new DiffReconstructor(gateway, {
      onMergedDiff: (_, strategy) => seen.push(strategy),
    }).reconstruct(group('new.md', ['c1']));

    expect(detail.baseContent).toBe('');
    expect(detail.diffText.split('\n')).toContain('+hello');
    expect(seen).toEqual(['synthesized']);
  });

  it('reuses the merged diff as the split diff for a single commit', async () => {
    const gateway = new FakeGateway();
    gateway.parents.set('c1', 'p0');
    gateway.rangedDiffs.set('p0..c1:a.md', 'only diff');

    const detail = await new DiffReconstructor(gateway).reconstruct(group('a.md', ['c1']));

    expect(detail.splitDiffText).toBe('only diff');
    expect(gateway.calls.filter((call) => call.startsWith('patchOfCommit'))).toEqual([]);
  });

  it('degrades a deleted document to empty head content', async () => {
    const gateway = new FakeGateway();
    gateway.parents.set('c1', 'p0');
    gateway.setFile('p0', 'gone.md', 'bye\n');

    const detail = await new DiffReconstructor(gateway).reconstruct(group('gone.md', ['c1']));

    expect(detail.headContent).toBe('');
    expect(detail.diffText).toContain('\n-bye\n');
  });

  it('skips commits with no block for the path in the split diff', async () => {
    const gateway = new FakeGateway();
    gateway.parents.set('c2', 'p0');
    gateway.fullPatches.set('c1', 'diff --git a/x.md b/x.md\n+c1\n');

    const detail = await new DiffReconstructor(gateway).reconstruct(group('x.md', ['c1', 'c2']));

    expect(detail.splitDiffText).toBe('diff --git a/x.md b/x.md\n+c1\n');
  });

  it('reports the strategy used for each group', async () => {
    const gateway = new FakeGateway();
    gateway.parents.set('c1', 'p0');
    gateway.pathPatches.set('c1:a.md', 'head patch');
    const seen: (string | null)[] = [];

    await new DiffReconstructor(gateway, { onMergedDiff: (_, strategy) => seen.push(strategy) }).reconstruct(
      group('a.md', ['c1']),
    );

    expect(seen).toEqual(['head-commit-patch']);
  });

  it('reconstructs all groups in input order across batches', async () => {
    const gateway = new FakeGateway();
    const groups = ['a.md', 'b.md', 'c.md'].map((path, i) => group(path, [`c${i}`]));

    const details = await new DiffReconstructor(gateway, { batchSize: 2 }).reconstructAll(groups);

    expect(details.map((d) => d.group.filePath)).toEqual(['a.md', 'b.md', 'c.md']);
  });

  it('propagates gateway rejections', async () => {
    const gateway = new FakeGateway();
    gateway.unavailable = new Error('git missing');

    await expect(new DiffReconstructor(gateway).reconstruct(group('a.md', ['c1']))).rejects.toThrow('git missing');
  });
});
