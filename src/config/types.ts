import type { NormalizationContext } from '../normalization';

export type ContextConfig = NormalizationContext;

export interface SnapshotConfig {
  /** Overwrite missing or mismatched snapshots with the preferred variation. */
  bless?: boolean;
}

export interface NormalizerConfig {
  context: ContextConfig;
  snapshot?: SnapshotConfig;
  profiles?: Record<string, NormalizerProfile>;
}

export interface NormalizerProfile {
  context?: Partial<ContextConfig>;
  snapshot?: SnapshotConfig;
}
