import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitGateway } from './gateway.js';
import { execGit, execGitStrict, getRepoRoot, isGitRepo, GitUnavailableError } from './executor.js';
import type { GitExecOptions } from './executor.js';

vi.mock('./executor.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./executor.js')>();
  return {
    ...actual,
    execGit: vi.fn(),
    execGitStrict: vi.fn(),
    getRepoRoot: vi.fn(),
    isGitRepo: vi.fn(),
  };
});

const execGitMock = vi.mocked(execGit);
const execGitStrictMock = vi.mocked(execGitStrict);
const getRepoRootMock = vi.mocked(getRepoRoot);
const isGitRepoMock = vi.mocked(isGitRepo);

function lastArgs(mock: typeof execGitMock | typeof execGitStrictMock): GitExecOptions | undefined {
  return mock.mock.calls.at(-1)?.[0];
}

describe('GitGateway', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    getRepoRootMock.mockResolvedValue('/repo');
  });

  it('runs the log query at the repository top level', async () => {
    execGitStrictMock.mockResolvedValue('log output');
    const gateway = new GitGateway('/repo/wiki');

    const output = await gateway.log(new Date('2026-10-13T13:00:00Z'));

    expect(output).toBe('log output');
    expect(lastArgs(execGitStrictMock)).toEqual({
      cwd: '/repo',
      args: [
        'log',
        '--since=2026-10-13T13:00:00.000Z',
        '--name-only',
        '--date=iso-strict',
        '--pretty=format:==COMMIT==%n%H%n%an%n%ae%n%ad%n%s',
      ],
    });
    expect(getRepoRootMock).toHaveBeenCalledWith('/repo/wiki');
  });

  it('resolves the top level once', async () => {
    execGitMock.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });
    const gateway = new GitGateway('/repo');

    await gateway.diffBetween('a', 'b', 'x.md');
    await gateway.diffBetween('a', 'b', 'y.md');

    expect(getRepoRootMock).toHaveBeenCalledTimes(1);
  });

  it('returns file text at a ref', async () => {
    execGitMock.mockResolvedValue({ stdout: '# Title\n', stderr: '', exitCode: 0 });
    const gateway = new GitGateway('/repo');

    expect(await gateway.showFileAt('c1', 'docs/a.md')).toBe('# Title\n');
    expect(lastArgs(execGitMock)?.args).toEqual(['show', 'c1:docs/a.md']);
  });

  it('returns null when the path does not exist at the ref', async () => {
    execGitMock.mockResolvedValue({ stdout: '', stderr: 'fatal: path does not exist', exitCode: 128 });
    const gateway = new GitGateway('/repo');

    expect(await gateway.showFileAt('c1', 'gone.md')).toBeNull();
  });

  it('builds the ranged diff command', async () => {
    execGitMock.mockResolvedValue({ stdout: 'diff --git a/x.md b/x.md\n', stderr: '', exitCode: 0 });
    const gateway = new GitGateway('/repo');

    expect(await gateway.diffBetween('base', 'head', 'x.md')).toBe('diff --git a/x.md b/x.md\n');
    expect(lastArgs(execGitMock)?.args).toEqual(['diff', '--no-color', 'base', 'head', '--', 'x.md']);
  });

  it('degrades a failed diff to an empty string', async () => {
    execGitMock.mockResolvedValue({ stdout: 'partial', stderr: 'bad revision', exitCode: 128 });
    const gateway = new GitGateway('/repo');

    expect(await gateway.diffBetween('nope', 'head', 'x.md')).toBe('');
  });

  it('restricts a commit patch to a path when given one', async () => {
    execGitMock.mockResolvedValue({ stdout: 'patch', stderr: '', exitCode: 0 });
    const gateway = new GitGateway('/repo');

    await gateway.patchOfCommit('c1', 'x.md');
    expect(lastArgs(execGitMock)?.args).toEqual(['show', '--no-color', '--format=', '--patch', 'c1', '--', 'x.md']);

    await gateway.patchOfCommit('c1');
    expect(lastArgs(execGitMock)?.args).toEqual(['show', '-m', '--no-color', '--format=', '--patch', 'c1']);
  });

  it('resolves a parent commit', async () => {
    execGitMock.mockResolvedValue({ stdout: 'p1\n', stderr: '', exitCode: 0 });
    const gateway = new GitGateway('/repo');

    expect(await gateway.resolveParent('c1')).toBe('p1');
    expect(lastArgs(execGitMock)?.args).toEqual(['rev-parse', '--verify', '--quiet', 'c1^']);
  });

  it('returns null for a root commit', async () => {
    execGitMock.mockResolvedValue({ stdout: '', stderr: '', exitCode: 1 });
    const gateway = new GitGateway('/repo');

    expect(await gateway.resolveParent('root')).toBeNull();
  });

  it('hashes an empty tree from empty stdin', async () => {
    execGitStrictMock.mockResolvedValue('4b825dc\n');
    const gateway = new GitGateway('/repo');

    expect(await gateway.emptyTree()).toBe('4b825dc');
    expect(lastArgs(execGitStrictMock)).toEqual({
      cwd: '/repo',
      args: ['hash-object', '-t', 'tree', '--stdin'],
      input: '',
    });
  });

  it('checks the document root is inside a repository', async () => {
    isGitRepoMock.mockResolvedValue(false);
    const gateway = new GitGateway('/tmp/plain');

    expect(await gateway.isRepository()).toBe(false);
    expect(isGitRepoMock).toHaveBeenCalledWith('/tmp/plain');
    expect(getRepoRootMock).not.toHaveBeenCalled();
  });

  it('reads the prefix and syncs from the document root', async () => {
    execGitStrictMock.mockResolvedValueOnce('wiki/\n').mockResolvedValueOnce('Already up to date.\n');
    const gateway = new GitGateway('/repo/wiki');

    expect(await gateway.repositoryRootPrefix()).toBe('wiki/');
    expect(execGitStrictMock.mock.calls[0]?.[0]).toEqual({ cwd: '/repo/wiki', args: ['rev-parse', '--show-prefix'] });

    expect(await gateway.sync()).toBe('Already up to date.\n');
    expect(execGitStrictMock.mock.calls[1]?.[0]).toEqual({ cwd: '/repo/wiki', args: ['pull'] });
  });

  it('propagates unavailability', async () => {
    execGitMock.mockRejectedValue(new GitUnavailableError('Git is not installed or not in PATH.', ['show']));
    const gateway = new GitGateway('/repo');

    await expect(gateway.showFileAt('c1', 'a.md')).rejects.toBeInstanceOf(GitUnavailableError);
  });
});
