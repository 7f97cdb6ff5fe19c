/**
 * chain-confidence
 * Multi-dimensional confidence scoring and feedback calibration for reasoning chains
 */

export * from './types/index.js';

export * from './config/constants.js';
export {
  ConfigManager,
  type ConfigManagerOptions,
  DEFAULT_CONFIG,
  type EngineConfig,
  EngineConfigSchema,
} from './config/config.js';
export {
  containsAnyKeyword,
  countKeywordHits,
  DEFAULT_LEXICON,
  type Lexicon,
  LexiconSchema,
  loadLexicon,
  parseLexicon,
} from './config/lexicon.js';

export { AssumptionRiskAssessor } from './core/assessors/AssumptionRiskAssessor.js';
export { CoherenceAssessor } from './core/assessors/CoherenceAssessor.js';
export { EvidenceQualityAssessor } from './core/assessors/EvidenceQualityAssessor.js';
export { StepQualityAssessor, stepCountBonus } from './core/assessors/StepQualityAssessor.js';
export type { AssessorOptions } from './core/assessors/types.js';

export {
  type AggregatorOptions,
  type AssessmentResult,
  ConfidenceAggregator,
  SAFE_DEFAULT_ANALYSIS,
} from './core/ConfidenceAggregator.js';
export {
  CalibrationTracker,
  type CalibrationTrackerOptions,
  computeAdjustment,
  type FeedbackInput,
} from './core/CalibrationTracker.js';
export {
  ConfidenceEngine,
  type ConfidenceEngineOptions,
  createConfidenceEngine,
} from './core/ConfidenceEngine.js';
export { parseReasoningChain, ReasoningChainSchema } from './core/chainValidation.js';
export {
  ComputationFaultError,
  ConfidenceError,
  ConfigurationError,
  getErrorCode,
  isRecoverable,
  MalformedInputError,
  normalizeError,
  ValidationError,
} from './core/errors.js';
export { explainAnalysis, meetsThreshold, summarizeAnalysis, verdictFor } from './core/explain.js';

export { Logger, logger } from './services/Logger.js';
