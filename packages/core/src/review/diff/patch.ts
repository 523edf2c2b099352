import { createTwoFilesPatch } from 'diff';

/** Opens each per-file block in git patch output. */
export const FILE_BLOCK_HEADER = 'diff --git ';

/** Name git prints for the missing side of a creation or deletion. */
const DEV_NULL = '/dev/null';

/**
 * Cut the block for `filePath` out of a multi-file git patch.
 *
 * A block starts at a `diff --git` line mentioning the path and runs until
 * the next `diff --git` line. Line endings are kept as they were. Returns ''
 * when no block mentions the path.
 */
export function extractFilePatch(fullPatch: string, filePath: string): string {
  const wanted = filePath.replace(/\\/g, '/');
  const lines = fullPatch.split(/(?<=\n)/);
  const captured: string[] = [];
  let capturing = false;

  for (const line of lines) {
    if (line.startsWith(FILE_BLOCK_HEADER)) {
      capturing = line.includes(wanted);
      if (capturing) captured.push(line);
    } else if (capturing) {
      captured.push(line);
    }
  }

  return captured.join('');
}

/**
 * Build a git-style unified diff from two versions of a document.
 *
 * Used when git cannot express the change for the path (for example across a
 * rename it did not follow). Returns null when the texts are identical.
 */
export function synthesizePatch(filePath: string, baseContent: string, headContent: string): string | null {
  if (baseContent === headContent) return null;

  const oldName = baseContent ? `a/${filePath}` : DEV_NULL;
  const newName = headContent ? `b/${filePath}` : DEV_NULL;
  const patch = createTwoFilesPatch(oldName, newName, baseContent, headContent);

  // jsdiff opens with an `Index:`/`===` banner; git opens with `diff --git`.
  const body = patch.slice(Math.max(0, patch.indexOf('--- ')));
  return `${FILE_BLOCK_HEADER}a/${filePath} b/${filePath}\n${body}`;
}
