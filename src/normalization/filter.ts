import { resolveLevelRules } from './levels';
import { replaceCaseInsensitive, replaceLiteral } from './replace';
import { trim, trimTrailingWhitespace } from './trim';
import type { LevelRules, NormalizationContext, NormalizationLevel } from './types';

const LOCATION_ARROW = '--> ';
const SECONDARY_LOCATION = '::: ';
const RUST_LIB_MARKER = '/rustlib/src/rust/src/';
// `$RUST` stands in for everything up to and including "/rustlib/src/rust".
const RUST_LIB_PREFIX_LENGTH = '/rustlib/src/rust'.length;

const ALWAYS_DROPPED_PREFIXES = ['error: aborting due to '];
const ALWAYS_DROPPED_LINES = ['To learn more, run the command again with --verbose.'];

interface ConditionalDrop {
  enabled: (rules: LevelRules) => boolean;
  prefixes: string[];
}

const CONDITIONAL_DROPS: ConditionalDrop[] = [
  {
    enabled: (rules) => rules.stripCouldNotCompile,
    prefixes: ['error: Could not compile `'],
  },
  {
    enabled: (rules) => rules.stripCouldNotCompileLowercase,
    prefixes: ['error: could not compile `'],
  },
  {
    enabled: (rules) => rules.stripForMoreInformation,
    prefixes: ['For more information about this error, try `rustc --explain'],
  },
  {
    enabled: (rules) => rules.stripDetailedExplanations,
    prefixes: [
      'Some errors have detailed explanations:',
      'For more information about an error, try `rustc --explain',
    ],
  },
];

/** Splits on `\n`, dropping one trailing `\r` per line and any empty final segment. */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

function rewriteLocationArrow(line: string): string | undefined {
  const cutEnd = Math.max(line.lastIndexOf('/'), line.lastIndexOf('\\'));
  if (cutEnd === -1) {
    return undefined;
  }
  const cutStart = line.indexOf('>') + 2;
  return `${line.slice(0, cutStart)}$DIR/${line.slice(cutEnd + 1)}`;
}

function rewriteSecondaryLocation(line: string, rules: LevelRules, context: NormalizationContext): string {
  const rewritten = replaceCaseInsensitive(line, context.workspaceRoot, '$WORKSPACE').replace(/\\/g, '/');
  if (!rules.collapseRustLib) {
    return rewritten;
  }
  const markerAt = rewritten.indexOf(RUST_LIB_MARKER);
  if (markerAt === -1) {
    return rewritten;
  }
  // ::: $RUST/src/libstd/net/ip.rs:83:1
  const pathStart = rewritten.indexOf(SECONDARY_LOCATION) + SECONDARY_LOCATION.length;
  return `${rewritten.slice(0, pathStart)}$RUST${rewritten.slice(markerAt + RUST_LIB_PREFIX_LENGTH)}`;
}

function isDropped(line: string, rules: LevelRules): boolean {
  if (ALWAYS_DROPPED_LINES.includes(line)) {
    return true;
  }
  if (ALWAYS_DROPPED_PREFIXES.some((prefix) => line.startsWith(prefix))) {
    return true;
  }
  return CONDITIONAL_DROPS.some(
    (drop) => drop.enabled(rules) && drop.prefixes.some((prefix) => line.startsWith(prefix)),
  );
}

/**
 * Normalizes one line under the given rules. Returns `undefined` when the line
 * is dropped from the output altogether.
 */
export function filterLine(line: string, rules: LevelRules, context: NormalizationContext): string | undefined {
  const indented = line.trimStart();

  if (indented.startsWith(LOCATION_ARROW)) {
    const rewritten = rewriteLocationArrow(line);
    if (rewritten !== undefined) {
      return rewritten;
    }
  }

  if (indented.startsWith(SECONDARY_LOCATION)) {
    return rewriteSecondaryLocation(line, rules, context);
  }

  if (isDropped(line, rules)) {
    return undefined;
  }

  let normalized = line;

  if (rules.dirBackslash) {
    normalized = replaceLiteral(normalized, `${context.sourceDirectory}\\`, '$DIR/');
  }

  if (rules.trimLineEnd) {
    normalized = trimTrailingWhitespace(normalized);
  }

  normalized = replaceLiteral(normalized, context.packageName, '$CRATE');
  normalized = replaceCaseInsensitive(normalized, context.sourceDirectory, '$DIR');
  return replaceCaseInsensitive(normalized, context.workspaceRoot, '$WORKSPACE');
}

/**
 * Runs every line of `text` through the filter for `level` and rejoins the
 * survivors, never leaving more than one blank line in a row.
 */
export function applyLevel(text: string, level: NormalizationLevel, context: NormalizationContext): string {
  const rules = resolveLevelRules(level);
  let normalized = '';

  for (const line of splitLines(text)) {
    const filtered = filterLine(line, rules, context);
    if (filtered === undefined) {
      continue;
    }
    normalized += filtered;
    if (!normalized.endsWith('\n\n')) {
      normalized += '\n';
    }
  }

  return trim(normalized);
}
