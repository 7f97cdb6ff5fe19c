/**
 * chain-confidence - Constants
 * Centralized scoring values
 */

import type { ReasoningMethod } from '../types/index.js';

// Confidence range (overall and reasoning confidence are clamped into it)
export const MIN_CONFIDENCE = 0.7;
export const MAX_CONFIDENCE = 0.95;
export const TARGET_CONFIDENCE = 0.85;

// Dimension weights for the combined score
export const DIMENSION_WEIGHTS = {
  reasoning: 0.35,
  evidence: 0.25,
  coherence: 0.2,
  assumptions: 0.2,
} as const;

// Step quality
export const STEP_SCORING = {
  strongHit: 0.03,
  moderateHit: 0.02,
  weakHit: -0.02,
  lengthThresholds: [100, 200],
  lengthBonus: 0.02,
  evidencePerItem: 0.02,
  evidenceCap: 0.05,
  assumptionAcknowledgement: 0.02,
  assumptionPerItem: 0.01,
  assumptionCap: 0.03,
  stepWeightFactor: 0.1,
} as const;

export const METHOD_BONUS: Readonly<Record<ReasoningMethod, number>> = {
  deductive: 0.05,
  inductive: 0.03,
  abductive: 0.02,
  comparative: 0.04,
  causal: 0.04,
};

// Ordered from the highest step count down; only the first match applies
export const STEP_COUNT_BONUS = [
  { minSteps: 6, bonus: 0.05 },
  { minSteps: 4, bonus: 0.03 },
] as const;

// Evidence quality
export const EVIDENCE_SCORING = {
  neutral: 0.5,
  base: 0.5,
  highHit: 0.15,
  mediumHit: 0.08,
  lowHit: -0.1,
  researchBonus: 0.1,
  citationBonus: 0.05,
  lengthThresholds: [50, 100],
  lengthBonus: 0.05,
  distributionFactor: 0.1,
  distributionCap: 0.1,
} as const;

// Coherence
export const COHERENCE_SCORING = {
  singleStep: 0.8,
  floor: 0.5,
  progressionBonus: 0.02,
  contradictionPenalty: 0.01,
} as const;

// Assumption risk
export const ASSUMPTION_SCORING = {
  noAssumptions: 0.8,
  baseRisk: 0.3,
  highRiskHit: 0.1,
  lowRiskHit: -0.1,
  uncertaintyHit: 0.15,
  densityThreshold: 2,
  densityPenalty: 0.05,
} as const;

// Derived diagnostics
export const SOURCE_RELIABILITY_FACTOR = 1.1;

// Calibration
export const CALIBRATION = {
  historyLimit: 100,
  metricsWindow: 20,
  recentAdjustments: 5,
  successCeiling: 0.9,
  failureFloor: 0.75,
  adjustmentRate: 0.1,
  maxAdjustment: 0.02,
  accuracyThreshold: 0.8,
  minRecordsForOffset: 3,
  ratingScale: { min: 1, max: 5 },
} as const;
