/**
 * AssumptionRiskAssessor - certainty of a chain given the assumptions it rests on
 */

import { ASSUMPTION_SCORING } from '../../config/constants.js';
import { countKeywordHits, DEFAULT_LEXICON, type Lexicon } from '../../config/lexicon.js';
import type { ReasoningChain } from '../../types/index.js';
import { clampUnit, mean } from '../../utils/math.js';
import type { AssessorOptions } from './types.js';

export class AssumptionRiskAssessor {
  private readonly lexicon: Lexicon;

  constructor(options: AssessorOptions = {}) {
    this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
  }

  /**
   * Risk carried by one assumption statement, in [0, 1]
   */
  scoreAssumption(text: string): number {
    const { highRisk, lowRisk, uncertainty } = this.lexicon.assumptions;
    let risk = ASSUMPTION_SCORING.baseRisk;

    risk += countKeywordHits(text, highRisk) * ASSUMPTION_SCORING.highRiskHit;
    risk += countKeywordHits(text, lowRisk) * ASSUMPTION_SCORING.lowRiskHit;
    risk += countKeywordHits(text, uncertainty) * ASSUMPTION_SCORING.uncertaintyHit;

    return clampUnit(risk);
  }

  /**
   * Certainty = 1 - mean risk, penalized when steps carry more than
   * two assumptions each on average.
   */
  assess(chain: ReasoningChain): number {
    const risks = chain.steps.flatMap((step) => step.assumptions.map((a) => this.scoreAssumption(a)));
    if (risks.length === 0) {
      return ASSUMPTION_SCORING.noAssumptions;
    }

    let certainty = 1 - mean(risks);

    const density = risks.length / chain.steps.length;
    if (density > ASSUMPTION_SCORING.densityThreshold) {
      certainty -= ASSUMPTION_SCORING.densityPenalty * (density - ASSUMPTION_SCORING.densityThreshold);
    }

    return clampUnit(certainty);
  }
}
