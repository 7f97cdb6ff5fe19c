/**
 * ConfidenceEngine - wires configuration, logging, the aggregator and a
 * calibration tracker together
 */

import { ConfigManager, type ConfigManagerOptions, type EngineConfig } from '../config/config.js';
import { DEFAULT_LEXICON, type Lexicon } from '../config/lexicon.js';
import { logger } from '../services/Logger.js';
import type { CalibrationMetrics, CalibrationRecord, ConfidenceAnalysis } from '../types/index.js';
import { CalibrationTracker, type FeedbackInput } from './CalibrationTracker.js';
import { ConfidenceAggregator } from './ConfidenceAggregator.js';
import { explainAnalysis, meetsThreshold } from './explain.js';

export interface ConfidenceEngineOptions extends ConfigManagerOptions {
  /** Pre-built configuration; skips file and environment discovery */
  config?: EngineConfig;
  lexicon?: Lexicon;
  /** Apply learned calibration offsets to the overall score (default: false) */
  applyCalibration?: boolean;
}

export class ConfidenceEngine {
  readonly config: EngineConfig;
  readonly aggregator: ConfidenceAggregator;
  readonly calibration: CalibrationTracker;

  constructor(options: ConfidenceEngineOptions = {}) {
    this.config = options.config
      ? ConfigManager.validate(options.config)
      : new ConfigManager(options).getAll();

    logger.configure(this.config.logging);

    const range = { min: this.config.confidence.min, max: this.config.confidence.max };
    this.calibration = new CalibrationTracker({ ...this.config.calibration, range });
    this.aggregator = new ConfidenceAggregator({
      range,
      lexicon: options.lexicon ?? DEFAULT_LEXICON,
      calibration: options.applyCalibration ? this.calibration : undefined,
    });
  }

  assess(chain: unknown): ConfidenceAnalysis {
    return this.aggregator.assess(chain);
  }

  recordFeedback(feedback: FeedbackInput): CalibrationRecord | undefined {
    return this.calibration.recordFeedback(feedback);
  }

  getMetrics(): CalibrationMetrics {
    return this.calibration.getMetrics();
  }

  isActionable(analysis: ConfidenceAnalysis): boolean {
    return meetsThreshold(analysis, this.config.confidence.target);
  }

  explain(analysis: ConfidenceAnalysis): string {
    return explainAnalysis(analysis, this.config.confidence.target);
  }
}

export function createConfidenceEngine(options: ConfidenceEngineOptions = {}): ConfidenceEngine {
  return new ConfidenceEngine(options);
}
