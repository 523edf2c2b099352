import type { CommitRecord } from '../types/index.js';
import type { VcsGateway } from './gateway.js';

// ─── Constants ──────────────────────────────────────────────────────────────

/** Line that opens every record in the log output. */
export const COMMIT_SENTINEL = '==COMMIT==';

/** hash, author name, author email, date, subject */
const METADATA_LINE_COUNT = 5;

/**
 * `--pretty` format for the review-window log. Each field sits on its own
 * line, so tabs or separators in subjects need no escaping.
 */
export const LOG_PRETTY_FORMAT = `format:${COMMIT_SENTINEL}%n%H%n%an%n%ae%n%ad%n%s`;

/** git's `--date=iso-strict` output: always carries `Z` or a `±HH:MM` offset. */
const ZONED_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

// ─── Errors ─────────────────────────────────────────────────────────────────

/**
 * The log output broke the format the query asked for.
 */
export class LogParseError extends Error {
  constructor(
    message: string,
    readonly commit: string,
    readonly rawValue: string,
  ) {
    super(message);
    this.name = 'LogParseError';
  }
}

// ─── Implementation ─────────────────────────────────────────────────────────

/**
 * Fetch the commits authored since `since`, newest first.
 */
export async function getCommitsSince(gateway: VcsGateway, since: Date): Promise<CommitRecord[]> {
  const output = await gateway.log(since);
  return parseLogOutput(output);
}

/**
 * Parse raw `git log --name-only` output produced with {@link LOG_PRETTY_FORMAT}.
 *
 * A trailing record cut short before its five metadata lines is dropped.
 *
 * @throws LogParseError when a timestamp is not a zoned ISO-8601 value
 */
export function parseLogOutput(output: string): CommitRecord[] {
  const lines = output.split(/\r?\n/);
  const commits: CommitRecord[] = [];
  let i = 0;

  while (i < lines.length) {
    if (lines[i] !== COMMIT_SENTINEL) {
      i++;
      continue;
    }

    const metadata = lines.slice(i + 1, i + 1 + METADATA_LINE_COUNT);
    const interrupted = metadata.indexOf(COMMIT_SENTINEL);
    if (interrupted !== -1) {
      // Truncated record followed by another one; resume at that sentinel.
      i += 1 + interrupted;
      continue;
    }
    if (metadata.length < METADATA_LINE_COUNT) break;

    const [hash, authorName, authorEmail, rawDate, subject] = metadata.map((l) => l.trim());
    i += 1 + METADATA_LINE_COUNT;

    const files: string[] = [];
    while (i < lines.length && lines[i] !== COMMIT_SENTINEL) {
      const file = lines[i].trim();
      if (file) files.push(file);
      i++;
    }

    commits.push({
      hash,
      authorName,
      authorEmail,
      date: parseZonedTimestamp(rawDate, hash),
      subject,
      files,
    });
  }

  return commits;
}

/**
 * Parse an ISO-8601 timestamp that must carry its own offset.
 * Offset-less values are rejected rather than read as local time.
 */
export function parseZonedTimestamp(value: string, commit = ''): Date {
  const parsed = ZONED_TIMESTAMP.test(value) ? new Date(value) : null;
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new LogParseError(
      `Unparseable commit timestamp '${value}'${commit ? ` for commit ${commit}` : ''}`,
      commit,
      value,
    );
  }
  return parsed;
}
