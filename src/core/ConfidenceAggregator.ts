/**
 * ConfidenceAggregator - public entry point for assessing a reasoning chain
 *
 * Validates the chain, runs the four dimension assessors, combines them with
 * fixed weights and clamps the result to the confidence range. Faults never
 * leave assess(): they are logged and replaced by the safe default analysis.
 */

import {
  DIMENSION_WEIGHTS,
  MAX_CONFIDENCE,
  MIN_CONFIDENCE,
  SOURCE_RELIABILITY_FACTOR,
} from '../config/constants.js';
import { DEFAULT_LEXICON } from '../config/lexicon.js';
import { logger } from '../services/Logger.js';
import type { ConfidenceAnalysis, ConfidenceRange, ReasoningChain } from '../types/index.js';
import { clampToRange } from '../utils/math.js';
import { AssumptionRiskAssessor } from './assessors/AssumptionRiskAssessor.js';
import { CoherenceAssessor } from './assessors/CoherenceAssessor.js';
import { EvidenceQualityAssessor } from './assessors/EvidenceQualityAssessor.js';
import { StepQualityAssessor } from './assessors/StepQualityAssessor.js';
import type { AssessorOptions } from './assessors/types.js';
import type { CalibrationTracker } from './CalibrationTracker.js';
import { parseReasoningChain } from './chainValidation.js';
import { ComputationFaultError, type ConfidenceError, normalizeError } from './errors.js';

export const SAFE_DEFAULT_ANALYSIS: Readonly<ConfidenceAnalysis> = Object.freeze({
  overall: MIN_CONFIDENCE,
  reasoningConfidence: MIN_CONFIDENCE,
  evidenceConfidence: 0.5,
  sourceReliability: 0.5,
  assumptionCertainty: 0.5,
  reasoningCoherence: 0.5,
});

export type AssessmentResult =
  | { ok: true; analysis: ConfidenceAnalysis }
  | { ok: false; error: ConfidenceError };

export interface AggregatorOptions extends AssessorOptions {
  /** When set, the overall score is shifted by the tracker's learned offset */
  calibration?: CalibrationTracker;
}

interface DimensionScores {
  reasoning: number;
  evidence: number;
  coherence: number;
  assumptions: number;
}

export class ConfidenceAggregator {
  private readonly range: ConfidenceRange;
  private readonly stepQuality: StepQualityAssessor;
  private readonly evidenceQuality: EvidenceQualityAssessor;
  private readonly coherence: CoherenceAssessor;
  private readonly assumptionRisk: AssumptionRiskAssessor;
  private readonly calibration?: CalibrationTracker;

  constructor(options: AggregatorOptions = {}) {
    this.range = options.range ?? { min: MIN_CONFIDENCE, max: MAX_CONFIDENCE };
    const assessorOptions: AssessorOptions = {
      lexicon: options.lexicon ?? DEFAULT_LEXICON,
      range: this.range,
    };
    this.stepQuality = new StepQualityAssessor(assessorOptions);
    this.evidenceQuality = new EvidenceQualityAssessor(assessorOptions);
    this.coherence = new CoherenceAssessor(assessorOptions);
    this.assumptionRisk = new AssumptionRiskAssessor(assessorOptions);
    this.calibration = options.calibration;
  }

  /**
   * Assess a chain; never throws
   */
  assess(chain: unknown): ConfidenceAnalysis {
    const result = this.tryAssess(chain);
    if (result.ok) {
      return result.analysis;
    }

    logger.error(`[Confidence] Assessment failed (${result.error.code}): ${result.error.message}`);
    return this.safeDefault();
  }

  /**
   * Assess a chain and report faults as a value instead of a fallback
   */
  tryAssess(chain: unknown): AssessmentResult {
    try {
      const parsed = parseReasoningChain(chain);
      return { ok: true, analysis: this.analyze(parsed) };
    } catch (error) {
      return { ok: false, error: normalizeError(error, 'COMPUTATION_FAULT') };
    }
  }

  safeDefault(): ConfidenceAnalysis {
    return {
      ...SAFE_DEFAULT_ANALYSIS,
      overall: this.range.min,
      reasoningConfidence: this.range.min,
    };
  }

  private analyze(chain: ReasoningChain): ConfidenceAnalysis {
    const scores: DimensionScores = {
      reasoning: this.stepQuality.assess(chain),
      evidence: this.evidenceQuality.assess(chain),
      coherence: this.coherence.assess(chain),
      assumptions: this.assumptionRisk.assess(chain),
    };

    for (const [dimension, value] of Object.entries(scores)) {
      if (!Number.isFinite(value)) {
        throw new ComputationFaultError(`Non-finite ${dimension} score`, dimension);
      }
    }

    const raw =
      scores.reasoning * DIMENSION_WEIGHTS.reasoning +
      scores.evidence * DIMENSION_WEIGHTS.evidence +
      scores.coherence * DIMENSION_WEIGHTS.coherence +
      scores.assumptions * DIMENSION_WEIGHTS.assumptions;

    let overall = clampToRange(raw, this.range);
    if (this.calibration) {
      const { calibrated, adjustment } = this.calibration.calibrate(overall, chain.reasoningMethod);
      if (adjustment !== 0) {
        logger.debug(`[Confidence] Calibration adjustment: ${adjustment > 0 ? '+' : ''}${adjustment.toFixed(4)}`);
      }
      overall = clampToRange(calibrated, this.range);
    }

    const analysis: ConfidenceAnalysis = {
      overall,
      reasoningConfidence: clampToRange(scores.reasoning, this.range),
      evidenceConfidence: scores.evidence,
      sourceReliability: Math.min(1, scores.evidence * SOURCE_RELIABILITY_FACTOR),
      assumptionCertainty: scores.assumptions,
      reasoningCoherence: scores.coherence,
    };

    logger.debug(
      `[Confidence] Score: ${analysis.overall.toFixed(3)} ` +
        `(R:${scores.reasoning.toFixed(2)} E:${scores.evidence.toFixed(2)} ` +
        `Co:${scores.coherence.toFixed(2)} A:${scores.assumptions.toFixed(2)}) ` +
        `over ${chain.steps.length} steps`,
    );

    return analysis;
  }
}
