import { Minimatch } from 'minimatch';
import type { MinimatchOptions } from 'minimatch';

// ─── Types ──────────────────────────────────────────────────────────────────

/**
 * A path rule ready for matching.
 */
export interface PathRule {
  /** Rule text as configured, including any `!` */
  source: string;
  /** True for `!`-prefixed rules, which re-include what they match */
  negated: boolean;
  matches(path: string): boolean;
}

/** Running verdict while rules are reduced; `unset` until some rule matches. */
type FilterDecision = 'unset' | 'exclude' | 'include';

// ─── Constants ──────────────────────────────────────────────────────────────

const NEGATION_MARKER = '!';

/** Characters that make a rule a glob rather than a bare folder name. */
const GLOB_METACHARACTERS = /[*?[]/;

const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nonegate: true,
  nocomment: true,
  nobrace: true,
  noext: true,
};

/**
 * Stands in for `/` in both glob and path, so minimatch sees a single segment
 * and `*` and `?` match across folders.
 */
const SEPARATOR_STAND_IN = '\uE000';

const NEVER_MATCHES: PathRule['matches'] = () => false;

// ─── Implementation ─────────────────────────────────────────────────────────

/**
 * Decide whether `path` is out of review scope.
 *
 * Every rule is evaluated in order and the last matching rule decides: a
 * plain rule excludes, a `!` rule includes. With no match the path is in
 * scope. `prefixToStrip` (the segment from the repository top level to the
 * document root) is removed before matching, so rules are written relative
 * to the document root.
 */
export function isExcluded(
  path: string,
  rules: readonly (string | PathRule)[],
  prefixToStrip = '',
): boolean {
  if (rules.length === 0) return false;

  const compiled = rules.map((rule) => (typeof rule === 'string' ? compilePathRule(rule) : rule));
  const normalized = normalizeRulePath(path, prefixToStrip);

  const decision = compiled.reduce<FilterDecision>(
    (current, rule) => (rule.matches(normalized) ? (rule.negated ? 'include' : 'exclude') : current),
    'unset',
  );

  return decision === 'exclude';
}

/**
 * Compile configured rules once so a pass does not rebuild them per path.
 */
export function compilePathRules(rules: readonly string[]): PathRule[] {
  return rules.map(compilePathRule);
}

export function compilePathRule(source: string): PathRule {
  const negated = source.startsWith(NEGATION_MARKER);
  const pattern = negated ? source.slice(NEGATION_MARKER.length) : source;
  const trimmed = pattern.replace(/\/+$/, '');

  const matchers = [
    compileGlob(pattern),
    // Directory form: anything below the rule
    compileGlob(`${trimmed}/*`),
  ];

  if (!GLOB_METACHARACTERS.test(pattern)) {
    // Bare folder name, e.g. `drafts` or `drafts/`
    matchers.push((path) => path === trimmed || path.startsWith(`${trimmed}/`));
  }

  return {
    source,
    negated,
    matches: (path) => pattern.length > 0 && matchers.some((match) => match(path)),
  };
}

/**
 * Canonical form the rules are matched against: forward slashes, document-root relative.
 */
export function normalizeRulePath(path: string, prefixToStrip = ''): string {
  const normalized = path.replace(/\\/g, '/');
  const prefix = prefixToStrip.replace(/\\/g, '/');
  return prefix && normalized.startsWith(prefix) ? normalized.slice(prefix.length) : normalized;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function compileGlob(pattern: string): PathRule['matches'] {
  let glob: Minimatch;
  try {
    glob = new Minimatch(flattenSeparators(pattern), GLOB_OPTIONS);
  } catch {
    // An invalid pattern is a rule that never matches.
    return NEVER_MATCHES;
  }
  return (path) => glob.match(flattenSeparators(path));
}

function flattenSeparators(value: string): string {
  return value.split('/').join(SEPARATOR_STAND_IN);
}
