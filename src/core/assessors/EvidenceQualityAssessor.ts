/**
 * EvidenceQualityAssessor - aggregate evidentiary support across a chain
 */

import { EVIDENCE_SCORING } from '../../config/constants.js';
import {
  containsAnyKeyword,
  countKeywordHits,
  DEFAULT_LEXICON,
  type Lexicon,
} from '../../config/lexicon.js';
import type { ReasoningChain } from '../../types/index.js';
import { clampUnit, mean } from '../../utils/math.js';
import type { AssessorOptions } from './types.js';

export class EvidenceQualityAssessor {
  private readonly lexicon: Lexicon;

  constructor(options: AssessorOptions = {}) {
    this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
  }

  /**
   * Heuristic quality of one evidence citation, in [0, 1]
   */
  scoreEvidence(text: string): number {
    const { high, medium, low, research, citation } = this.lexicon.evidence;
    let score = EVIDENCE_SCORING.base;

    score += countKeywordHits(text, high) * EVIDENCE_SCORING.highHit;
    score += countKeywordHits(text, medium) * EVIDENCE_SCORING.mediumHit;
    score += countKeywordHits(text, low) * EVIDENCE_SCORING.lowHit;

    if (containsAnyKeyword(text, research)) score += EVIDENCE_SCORING.researchBonus;
    if (containsAnyKeyword(text, citation)) score += EVIDENCE_SCORING.citationBonus;

    for (const threshold of EVIDENCE_SCORING.lengthThresholds) {
      if (text.length > threshold) score += EVIDENCE_SCORING.lengthBonus;
    }

    return clampUnit(score);
  }

  /**
   * Mean evidence quality plus a bonus for evidence spread over many steps.
   * A chain without any evidence is neutral.
   */
  assess(chain: ReasoningChain): number {
    const scores = chain.steps.flatMap((step) => step.evidence.map((e) => this.scoreEvidence(e)));
    if (scores.length === 0) {
      return EVIDENCE_SCORING.neutral;
    }

    const stepsWithEvidence = chain.steps.filter((step) => step.evidence.length > 0).length;
    const distribution = Math.min(
      EVIDENCE_SCORING.distributionCap,
      (stepsWithEvidence / chain.steps.length) * EVIDENCE_SCORING.distributionFactor,
    );

    return clampUnit(mean(scores) + distribution);
  }
}
