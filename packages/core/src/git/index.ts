// Executor
export { execGit, execGitStrict, getRepoRoot, isGitRepo, GitUnavailableError } from './executor.js';
export type { GitExecOptions, GitExecResult } from './executor.js';

// Gateway
export { GitGateway } from './gateway.js';
export type { VcsGateway } from './gateway.js';

// Log
export {
  getCommitsSince,
  parseLogOutput,
  parseZonedTimestamp,
  LogParseError,
  COMMIT_SENTINEL,
  LOG_PRETTY_FORMAT,
} from './log.js';
