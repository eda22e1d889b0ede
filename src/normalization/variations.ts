import { applyLevel } from './filter';
import { NORMALIZATION_LEVELS } from './levels';
import { decodeOutput } from './trim';
import type {
  NormalizationContext,
  NormalizationLevel,
  RawOutput,
  Variation,
  VariationPredicate,
} from './types';

/**
 * The acceptable normalized forms of one tool output, one per level in level
 * order. The last entry is the preferred (most aggressive) form.
 */
export class Variations {
  private readonly variations: readonly Variation[];

  constructor(variations: readonly Variation[]) {
    if (variations.length === 0) {
      throw new Error('Variations requires at least one normalization level');
    }
    this.variations = [...variations];
  }

  get size(): number {
    return this.variations.length;
  }

  preferred(): string {
    return this.variations[this.variations.length - 1].output;
  }

  any(predicate: VariationPredicate): boolean {
    return this.variations.some((variation) => predicate(variation.output, variation.level));
  }

  matchingLevel(predicate: VariationPredicate): NormalizationLevel | undefined {
    return this.variations.find((variation) => predicate(variation.output, variation.level))?.level;
  }

  at(level: NormalizationLevel): string | undefined {
    return this.variations.find((variation) => variation.level === level)?.output;
  }

  entries(): readonly Variation[] {
    return this.variations;
  }
}

/**
 * Produces every output against which a saved snapshot of `output` is
 * considered correct. A snapshot saved before a level existed still matches
 * the variation of the level it was produced at.
 */
export function diagnostics(output: RawOutput, context: NormalizationContext): Variations {
  const text = decodeOutput(output).replace(/\r\n/g, '\n');
  return new Variations(
    NORMALIZATION_LEVELS.map((level) => ({ level, output: applyLevel(text, level, context) })),
  );
}
