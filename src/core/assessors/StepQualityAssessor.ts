/**
 * StepQualityAssessor - textual and structural quality of reasoning steps
 *
 * Scores each step from the confidence floor upwards (connector keywords,
 * length, cited evidence, acknowledged assumptions, self-reported confidence)
 * and rolls the steps up into the chain's reasoning confidence.
 */

import {
  MAX_CONFIDENCE,
  METHOD_BONUS,
  MIN_CONFIDENCE,
  STEP_COUNT_BONUS,
  STEP_SCORING,
} from '../../config/constants.js';
import { countKeywordHits, DEFAULT_LEXICON, type Lexicon } from '../../config/lexicon.js';
import type { ConfidenceRange, ReasoningChain, ReasoningStep } from '../../types/index.js';
import { clampToRange } from '../../utils/math.js';
import type { AssessorOptions } from './types.js';

export class StepQualityAssessor {
  private readonly lexicon: Lexicon;
  private readonly range: ConfidenceRange;

  constructor(options: AssessorOptions = {}) {
    this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
    this.range = options.range ?? { min: MIN_CONFIDENCE, max: MAX_CONFIDENCE };
  }

  /**
   * Quality of a single step, clamped to the confidence range
   */
  scoreStep(step: ReasoningStep): number {
    const { strong, moderate, weak } = this.lexicon.reasoning;
    const text = step.reasoning;
    let score = this.range.min;

    score += countKeywordHits(text, strong) * STEP_SCORING.strongHit;
    score += countKeywordHits(text, moderate) * STEP_SCORING.moderateHit;
    score += countKeywordHits(text, weak) * STEP_SCORING.weakHit;

    for (const threshold of STEP_SCORING.lengthThresholds) {
      if (text.length > threshold) score += STEP_SCORING.lengthBonus;
    }

    score += Math.min(STEP_SCORING.evidenceCap, step.evidence.length * STEP_SCORING.evidencePerItem);

    if (step.assumptions.length > 0) {
      score += STEP_SCORING.assumptionAcknowledgement;
      score -= Math.min(
        STEP_SCORING.assumptionCap,
        step.assumptions.length * STEP_SCORING.assumptionPerItem,
      );
    }

    if (step.confidence !== undefined && step.confidence > 0) {
      score = (score + step.confidence) / 2;
    }

    return clampToRange(score, this.range);
  }

  /**
   * Chain-level reasoning confidence: step scores weighted towards later
   * steps, plus method and chain-length bonuses.
   */
  assess(chain: ReasoningChain): number {
    if (chain.steps.length === 0) {
      return this.range.min;
    }

    let weightedSum = 0;
    let totalWeight = 0;
    for (const step of chain.steps) {
      const weight = 1 + STEP_SCORING.stepWeightFactor * step.stepNumber;
      weightedSum += this.scoreStep(step) * weight;
      totalWeight += weight;
    }

    let score = weightedSum / totalWeight;
    score += METHOD_BONUS[chain.reasoningMethod];
    score += stepCountBonus(chain.steps.length);

    return clampToRange(score, this.range);
  }
}

/**
 * Largest applicable chain-length bonus; the thresholds never stack
 */
export function stepCountBonus(stepCount: number): number {
  const tier = STEP_COUNT_BONUS.find((t) => stepCount >= t.minSteps);
  return tier ? tier.bonus : 0;
}
