import type { NORMALIZATION_LEVELS } from './levels';

export type NormalizationLevel = (typeof NORMALIZATION_LEVELS)[number];

/** Raw tool output as captured by the caller. A Node `Buffer` is accepted as-is. */
export type RawOutput = Uint8Array | string;

export interface NormalizationContext {
  /** Package identifier, redacted as `$CRATE`. */
  readonly packageName: string;
  /** Absolute path of the test source directory, redacted as `$DIR`. */
  readonly sourceDirectory: string;
  /** Absolute path of the workspace root, redacted as `$WORKSPACE`. */
  readonly workspaceRoot: string;
}

export interface LevelRules {
  stripCouldNotCompile: boolean;
  stripCouldNotCompileLowercase: boolean;
  stripForMoreInformation: boolean;
  stripDetailedExplanations: boolean;
  dirBackslash: boolean;
  trimLineEnd: boolean;
  collapseRustLib: boolean;
}

export interface Variation {
  level: NormalizationLevel;
  output: string;
}

export type VariationPredicate = (output: string, level: NormalizationLevel) => boolean;
