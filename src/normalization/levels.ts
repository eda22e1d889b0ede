import type { LevelRules, NormalizationLevel } from './types';

/**
 * Normalization levels from least to most aggressive. Each level applies every
 * rule of the levels before it. Saved snapshots may have been produced at any
 * of these, so new levels are only ever appended.
 */
export const NORMALIZATION_LEVELS = [
  'basic',
  'strip-could-not-compile',
  'strip-could-not-compile-2',
  'strip-for-more-information',
  'strip-for-more-information-2',
  'dir-backslash',
  'trim-end',
  'rust-lib',
] as const;

export const PREFERRED_LEVEL: NormalizationLevel = NORMALIZATION_LEVELS[NORMALIZATION_LEVELS.length - 1];

export function isNormalizationLevel(value: string): value is NormalizationLevel {
  return NORMALIZATION_LEVELS.some((level) => level === value);
}

export function levelRank(level: NormalizationLevel): number {
  return NORMALIZATION_LEVELS.indexOf(level);
}

export function resolveLevelRules(level: NormalizationLevel): LevelRules {
  const rank = levelRank(level);
  const atLeast = (threshold: NormalizationLevel) => rank >= levelRank(threshold);

  return {
    stripCouldNotCompile: atLeast('strip-could-not-compile'),
    stripCouldNotCompileLowercase: atLeast('strip-could-not-compile-2'),
    stripForMoreInformation: atLeast('strip-for-more-information'),
    stripDetailedExplanations: atLeast('strip-for-more-information-2'),
    dirBackslash: atLeast('dir-backslash'),
    trimLineEnd: atLeast('trim-end'),
    collapseRustLib: atLeast('rust-lib'),
  };
}
