import { execFile as execFileCb } from 'node:child_process';

// ─── Constants ──────────────────────────────────────────────────────────────

/** Default timeout for git commands (ms) */
const DEFAULT_TIMEOUT_MS = 30_000;

/** Max output buffer size (bytes). Full commit patches of large merges can be big. */
const MAX_BUFFER_BYTES = 32 * 1024 * 1024;

// ─── Types ──────────────────────────────────────────────────────────────────

export interface GitExecOptions {
  /** Working directory (typically the repo root) */
  cwd: string;
  /** Git subcommand and arguments (e.g. ['show', 'HEAD:README.md']) */
  args: string[];
  /** Timeout in ms. Defaults to 30s. */
  timeout?: number;
  /** Environment variable overrides */
  env?: Record<string, string>;
  /** Text written to the process's stdin, which is then closed */
  input?: string;
}

export interface GitExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Raised when git itself cannot be run or its output cannot be read in full:
 * missing binary, timeout, kill signal or output past the buffer limit. A
 * non-zero exit is not an unavailability.
 */
export class GitUnavailableError extends Error {
  constructor(
    message: string,
    readonly args: readonly string[],
  ) {
    super(message);
    this.name = 'GitUnavailableError';
  }
}

// ─── Execution ──────────────────────────────────────────────────────────────

/**
 * Execute a git command and return the result.
 *
 * Non-zero exit codes are returned (not thrown); callers decide
 * whether a non-zero exit is an error for their use case.
 *
 * @throws GitUnavailableError if git is not installed, the command times out,
 *         or the process is killed by signal.
 */
export async function execGit(options: GitExecOptions): Promise<GitExecResult> {
  const { cwd, args, timeout = DEFAULT_TIMEOUT_MS, env, input } = options;

  return new Promise<GitExecResult>((resolve, reject) => {
    const child = execFileCb(
      'git',
      args,
      {
        cwd,
        timeout,
        maxBuffer: MAX_BUFFER_BYTES,
        encoding: 'utf8',
        env: env ? { ...process.env, ...env } : undefined,
      },
      (error, stdout, stderr) => {
        // Process not found
        if (error && 'code' in error && error.code === 'ENOENT') {
          reject(new GitUnavailableError('Git is not installed or not in PATH.', args));
          return;
        }

        // Output larger than the buffer: the result would be truncated
        if (error && 'code' in error && error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
          reject(
            new GitUnavailableError(
              `Git output exceeded ${String(MAX_BUFFER_BYTES)} bytes: git ${args.join(' ')}`,
              args,
            ),
          );
          return;
        }

        // Timed out or killed
        if (error && 'killed' in error && error.killed) {
          reject(
            new GitUnavailableError(
              `Git command timed out after ${String(timeout)}ms: git ${args.join(' ')}`,
              args,
            ),
          );
          return;
        }

        // Normal completion (including non-zero exit)
        const exitCode =
          error && 'code' in error && typeof error.code === 'number' ? error.code : 0;

        resolve({
          stdout: String(stdout),
          stderr: String(stderr),
          exitCode: error ? exitCode || 1 : 0,
        });
      },
    );

    if (input !== undefined) {
      child.stdin?.end(input);
    }
  });
}

/**
 * Convenience: execute a git command and throw if it exits non-zero.
 */
export async function execGitStrict(options: GitExecOptions): Promise<string> {
  const result = await execGit(options);
  if (result.exitCode !== 0) {
    throw new Error(
      `Git command failed (exit ${String(result.exitCode)}): git ${options.args.join(' ')}\n${result.stderr}`,
    );
  }
  return result.stdout;
}

/**
 * Check if a directory is inside a git work tree.
 */
export async function isGitRepo(cwd: string): Promise<boolean> {
  const result = await execGit({ cwd, args: ['rev-parse', '--is-inside-work-tree'] });
  return result.exitCode === 0 && result.stdout.trim() === 'true';
}

/**
 * Get the root directory of the git repository containing `cwd`.
 */
export async function getRepoRoot(cwd: string): Promise<string> {
  return (await execGitStrict({ cwd, args: ['rev-parse', '--show-toplevel'] })).trim();
}
