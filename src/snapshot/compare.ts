import type { NormalizationLevel, Variations } from '../normalization';

export interface SnapshotComparison {
  matched: boolean;
  /** First level whose output equals the snapshot, when one does. */
  level?: NormalizationLevel;
  preferred: string;
}

export function normalizeSnapshotText(expected: string): string {
  return expected.replace(/\r\n/g, '\n');
}

export function compareSnapshot(variations: Variations, expected: string): SnapshotComparison {
  const normalized = normalizeSnapshotText(expected);
  const level = variations.matchingLevel((output) => output === normalized);
  return {
    matched: level !== undefined,
    level,
    preferred: variations.preferred(),
  };
}

/** Renders the expected/actual blocks shown when a snapshot does not match. */
export function formatMismatch(expected: string, actual: string): string {
  const rule = '┈'.repeat(60);
  return [
    'EXPECTED:',
    rule,
    normalizeSnapshotText(expected).trimEnd(),
    rule,
    '',
    'ACTUAL:',
    rule,
    actual.trimEnd(),
    rule,
    '',
  ].join('\n');
}
