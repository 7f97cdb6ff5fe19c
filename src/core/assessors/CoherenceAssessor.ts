/**
 * CoherenceAssessor - internal consistency and logical flow of a chain
 *
 * Low spread in self-reported confidence reads as coherent; connector words
 * after the first step add to it, antonym pairs inside one step take away.
 */

import { COHERENCE_SCORING } from '../../config/constants.js';
import { containsAnyKeyword, DEFAULT_LEXICON, type Lexicon } from '../../config/lexicon.js';
import type { ReasoningChain } from '../../types/index.js';
import { clampUnit, populationStdDev } from '../../utils/math.js';
import type { AssessorOptions } from './types.js';

export class CoherenceAssessor {
  private readonly lexicon: Lexicon;

  constructor(options: AssessorOptions = {}) {
    this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
  }

  assess(chain: ReasoningChain): number {
    const { steps } = chain;
    if (steps.length <= 1) {
      return COHERENCE_SCORING.singleStep;
    }

    // Steps without a self-reported confidence do not contribute to the spread
    const confidences = steps
      .map((step) => step.confidence)
      .filter((c): c is number => c !== undefined);
    let coherence = Math.max(COHERENCE_SCORING.floor, 1 - populationStdDev(confidences));

    for (const step of steps.slice(1)) {
      if (containsAnyKeyword(step.reasoning, this.lexicon.coherence.connectors)) {
        coherence += COHERENCE_SCORING.progressionBonus;
      }
    }

    for (const step of steps) {
      coherence -= this.contradictionCount(step.reasoning) * COHERENCE_SCORING.contradictionPenalty;
    }

    return clampUnit(coherence);
  }

  /**
   * Number of antonym pairs whose both members occur in the text
   */
  contradictionCount(text: string): number {
    const lower = text.toLowerCase();
    return this.lexicon.coherence.contradictionPairs.filter(
      ([a, b]) => lower.includes(a) && lower.includes(b),
    ).length;
  }
}
