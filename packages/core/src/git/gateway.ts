import { execGit, execGitStrict, getRepoRoot, isGitRepo } from './executor.js';
import { LOG_PRETTY_FORMAT } from './log.js';

// ─── Types ──────────────────────────────────────────────────────────────────

/**
 * Read-only query surface over a version-control working copy, plus the one
 * mutating `sync`.
 *
 * "Not found" (unknown ref, path absent at a ref) resolves to `null` or an
 * empty string. Rejections mean the repository could not be queried at all.
 */
export interface VcsGateway {
  /** Whether the document root is inside a working copy at all */
  isRepository(): Promise<boolean>;
  /** Raw log of commits since `since`, newest first, in the review-window format */
  log(since: Date): Promise<string>;
  /** File text at `ref`, or null when the ref or path does not exist */
  showFileAt(ref: string, path: string): Promise<string | null>;
  /** Unified diff of `path` between two refs */
  diffBetween(baseRef: string, headRef: string, path: string): Promise<string>;
  /**
   * Patch introduced by `commit`. With `path`, restricted to that path using
   * git's default merge presentation; without, the full patch against every
   * parent.
   */
  patchOfCommit(commit: string, path?: string): Promise<string>;
  /** First parent of `commit`, or null for a root commit */
  resolveParent(commit: string): Promise<string | null>;
  /** Id of the empty tree, the base for groups that start at a root commit */
  emptyTree(): Promise<string>;
  /** Path from the repository top level to the document root, e.g. `wiki/` or `''` */
  repositoryRootPrefix(): Promise<string>;
  /** Bring the working copy up to date with its upstream */
  sync(): Promise<string>;
}

// ─── Implementation ─────────────────────────────────────────────────────────

/**
 * {@link VcsGateway} backed by the git CLI.
 *
 * History queries run at the repository top level because log paths are
 * root-relative; the document root only feeds the prefix.
 */
export class GitGateway implements VcsGateway {
  private topLevel: Promise<string> | undefined;

  constructor(private readonly documentRoot: string) {}

  isRepository(): Promise<boolean> {
    return isGitRepo(this.documentRoot);
  }

  async log(since: Date): Promise<string> {
    return execGitStrict({
      cwd: await this.root(),
      args: [
        'log',
        `--since=${since.toISOString()}`,
        '--name-only',
        '--date=iso-strict',
        `--pretty=${LOG_PRETTY_FORMAT}`,
      ],
    });
  }

  async showFileAt(ref: string, path: string): Promise<string | null> {
    const result = await execGit({ cwd: await this.root(), args: ['show', `${ref}:${path}`] });
    return result.exitCode === 0 ? result.stdout : null;
  }

  async diffBetween(baseRef: string, headRef: string, path: string): Promise<string> {
    return this.stdoutOrEmpty(['diff', '--no-color', baseRef, headRef, '--', path]);
  }

  async patchOfCommit(commit: string, path?: string): Promise<string> {
    if (path !== undefined) {
      return this.stdoutOrEmpty(['show', '--no-color', '--format=', '--patch', commit, '--', path]);
    }
    return this.stdoutOrEmpty(['show', '-m', '--no-color', '--format=', '--patch', commit]);
  }

  async resolveParent(commit: string): Promise<string | null> {
    const result = await execGit({
      cwd: await this.root(),
      args: ['rev-parse', '--verify', '--quiet', `${commit}^`],
    });
    const parent = result.stdout.trim();
    return result.exitCode === 0 && parent ? parent : null;
  }

  async emptyTree(): Promise<string> {
    const hash = await execGitStrict({
      cwd: await this.root(),
      args: ['hash-object', '-t', 'tree', '--stdin'],
      input: '',
    });
    return hash.trim();
  }

  async repositoryRootPrefix(): Promise<string> {
    return (await execGitStrict({ cwd: this.documentRoot, args: ['rev-parse', '--show-prefix'] })).trim();
  }

  async sync(): Promise<string> {
    return execGitStrict({ cwd: this.documentRoot, args: ['pull'] });
  }

  // ─── Helpers ────────────────────────────────────────────────────────────

  private root(): Promise<string> {
    this.topLevel ??= getRepoRoot(this.documentRoot);
    return this.topLevel;
  }

  private async stdoutOrEmpty(args: string[]): Promise<string> {
    const result = await execGit({ cwd: await this.root(), args });
    return result.exitCode === 0 ? result.stdout : '';
  }
}
