/**
 * chain-confidence - Reasoning chain and analysis types
 */

export const REASONING_METHODS = [
  'deductive',
  'inductive',
  'abductive',
  'comparative',
  'causal',
] as const;

export type ReasoningMethod = (typeof REASONING_METHODS)[number];

/**
 * One unit of reasoning inside a chain
 */
export interface ReasoningStep {
  /** Positive, unique within the chain; later steps carry more weight */
  stepNumber: number;
  description: string;
  reasoning: string;
  /** Self-reported confidence in [0, 1] */
  confidence?: number;
  evidence: readonly string[];
  assumptions: readonly string[];
}

/**
 * A multi-step reasoning trace submitted for assessment.
 * The summary fields are informational; the engine recomputes its own.
 */
export interface ReasoningChain {
  query: string;
  steps: readonly ReasoningStep[];
  finalConclusion: string;
  reasoningMethod: ReasoningMethod;
  overallConfidence?: number;
  evidenceQuality?: number;
  assumptionRisk?: number;
}

/**
 * Multi-dimensional confidence produced for one chain
 */
export interface ConfidenceAnalysis {
  /** Combined score, always inside the configured confidence range */
  overall: number;
  /** Step-quality rollup, also clamped to the confidence range */
  reasoningConfidence: number;
  evidenceConfidence: number;
  sourceReliability: number;
  assumptionCertainty: number;
  reasoningCoherence: number;
}

/**
 * Inclusive range every clamped score is forced into
 */
export interface ConfidenceRange {
  min: number;
  max: number;
}
