import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execGit, isGitRepo, GitUnavailableError } from './executor.js';

type ExecError = Error & { code?: string | number; killed?: boolean };

const outcome = vi.hoisted(() => {
  const next: { error: ExecError | null; stdout: string; stderr: string } = { error: null, stdout: '', stderr: '' };
  return next;
});

vi.mock('node:child_process', () => ({
  execFile: (
    _file: string,
    _args: string[],
    _options: unknown,
    callback: (error: ExecError | null, stdout: string, stderr: string) => void,
  ) => {
    callback(outcome.error, outcome.stdout, outcome.stderr);
    return { stdin: null };
  },
}));

function execError(message: string, fields: { code?: string | number; killed?: boolean }): ExecError {
  return Object.assign(new Error(message), fields);
}

describe('execGit', () => {
  beforeEach(() => {
    outcome.error = null;
    outcome.stdout = '';
    outcome.stderr = '';
  });

  it('returns a non-zero exit instead of throwing', async () => {
    outcome.error = execError('Command failed', { code: 128 });
    outcome.stderr = 'fatal: bad revision\n';

    const result = await execGit({ cwd: '/repo', args: ['show', 'nope:a.md'] });

    expect(result).toEqual({ stdout: '', stderr: 'fatal: bad revision\n', exitCode: 128 });
  });

  it('rejects when git is missing', async () => {
    outcome.error = execError('spawn git ENOENT', { code: 'ENOENT' });

    await expect(execGit({ cwd: '/repo', args: ['status'] })).rejects.toThrow('Git is not installed or not in PATH.');
  });

  it('rejects instead of reporting "not found" when output overflows the buffer', async () => {
    outcome.error = execError('stdout maxBuffer length exceeded', {
      code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
      killed: true,
    });
    outcome.stdout = 'partial';

    const pending = execGit({ cwd: '/repo', args: ['show', 'c1'] });

    await expect(pending).rejects.toBeInstanceOf(GitUnavailableError);
    await expect(pending).rejects.toThrow('Git output exceeded 33554432 bytes: git show c1');
  });
});

describe('isGitRepo', () => {
  beforeEach(() => {
    outcome.error = null;
    outcome.stderr = '';
  });

  it('is true inside a work tree', async () => {
    outcome.stdout = 'true\n';
    expect(await isGitRepo('/repo')).toBe(true);
  });

  it('is false when rev-parse fails', async () => {
    outcome.stdout = '';
    outcome.error = execError('Command failed', { code: 128 });
    expect(await isGitRepo('/tmp/plain')).toBe(false);
  });
});
