/**
 * CalibrationTracker - feedback-driven calibration of confidence scores
 *
 * Keeps a bounded, oldest-first history of prediction/outcome pairs and
 * derives rolling metrics and score offsets from the most recent window.
 * recordFeedback runs to completion synchronously, so concurrent callers on
 * the event loop are serialized; readers always receive copies.
 */

import { CalibrationSettingsSchema } from '../config/config.js';
import { CALIBRATION, MAX_CONFIDENCE, MIN_CONFIDENCE } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import type {
  CalibratedScore,
  CalibrationMetrics,
  CalibrationRecord,
  ConfidenceRange,
  ReasoningChain,
  ReasoningMethod,
} from '../types/index.js';
import { clampToRange, mean } from '../utils/math.js';
import { ConfigurationError, ValidationError } from './errors.js';

export interface CalibrationTrackerOptions {
  historyLimit?: number;
  metricsWindow?: number;
  recentAdjustments?: number;
  ratingScale?: { min: number; max: number };
  range?: ConfidenceRange;
}

export interface FeedbackInput {
  /** The overall confidence previously produced for the chain */
  predictedConfidence: number;
  actualOutcome: boolean;
  userRating: number;
  chain?: ReasoningChain;
}

/**
 * Signed correction for one outcome: nudge up after an under-trusted
 * success, down after an over-trusted failure.
 */
export function computeAdjustment(predicted: number, actualOutcome: boolean): number {
  if (actualOutcome && predicted < CALIBRATION.successCeiling) {
    return Math.min(
      CALIBRATION.maxAdjustment,
      (CALIBRATION.successCeiling - predicted) * CALIBRATION.adjustmentRate,
    );
  }
  if (!actualOutcome && predicted > CALIBRATION.failureFloor) {
    return -Math.min(
      CALIBRATION.maxAdjustment,
      (predicted - CALIBRATION.failureFloor) * CALIBRATION.adjustmentRate,
    );
  }
  return 0;
}

export class CalibrationTracker {
  private history: CalibrationRecord[] = [];
  private readonly historyLimit: number;
  private readonly metricsWindow: number;
  private readonly recentAdjustments: number;
  private readonly ratingScale: { min: number; max: number };
  private readonly range: ConfidenceRange;

  constructor(options: CalibrationTrackerOptions = {}) {
    CalibrationTracker.validateOptions(options);
    this.historyLimit = options.historyLimit ?? CALIBRATION.historyLimit;
    this.metricsWindow = options.metricsWindow ?? CALIBRATION.metricsWindow;
    this.recentAdjustments = options.recentAdjustments ?? CALIBRATION.recentAdjustments;
    this.ratingScale = options.ratingScale ?? { ...CALIBRATION.ratingScale };
    this.range = options.range ?? { min: MIN_CONFIDENCE, max: MAX_CONFIDENCE };
  }

  /**
   * Record the outcome of a previously scored chain. Invalid feedback is
   * ignored with a warning and yields undefined.
   */
  recordFeedback(feedback: FeedbackInput | null | undefined): CalibrationRecord | undefined {
    if (typeof feedback !== 'object' || feedback === null) {
      logger.warn(`[Calibration] Ignoring feedback: expected an object, got ${String(feedback)}`);
      return undefined;
    }

    const invalid = this.validate(feedback);
    if (invalid) {
      logger.warn(`[Calibration] Ignoring feedback: ${invalid.message}`);
      return undefined;
    }

    const { predictedConfidence, actualOutcome, userRating, chain } = feedback;
    const record: CalibrationRecord = Object.freeze({
      predictedConfidence,
      actualOutcome,
      userRating,
      adjustment: computeAdjustment(predictedConfidence, actualOutcome),
      timestamp: new Date(),
      ...(chain && { reasoningMethod: chain.reasoningMethod, query: chain.query }),
    });

    this.history.push(record);
    if (this.history.length > this.historyLimit) {
      this.history.shift();
    }

    logger.debug(
      `[Calibration] Recorded predicted=${predictedConfidence.toFixed(2)}, ` +
        `outcome=${actualOutcome}, adjustment=${record.adjustment.toFixed(4)}`,
    );
    return record;
  }

  /**
   * Rolling metrics over the most recent window of records
   */
  getMetrics(): CalibrationMetrics {
    if (this.history.length === 0) {
      return { status: 'no_data', message: 'No calibration data available yet' };
    }

    const window = this.recentWindow();
    const accurate = window.filter((r) =>
      r.actualOutcome
        ? r.predictedConfidence > CALIBRATION.accuracyThreshold
        : r.predictedConfidence <= CALIBRATION.accuracyThreshold,
    ).length;

    return {
      status: 'ok',
      totalRecords: this.history.length,
      sampleSize: window.length,
      calibrationAccuracy: accurate / window.length,
      averageAdjustment: mean(window.map((r) => Math.abs(r.adjustment))),
      averageUserRating: mean(window.map((r) => r.userRating)),
      recentAdjustments: lastN(window, this.recentAdjustments).map((r) => r.adjustment),
    };
  }

  /**
   * Shift a raw score by the mean adjustment of recent records, preferring
   * records of the same reasoning method when there are enough of them.
   */
  calibrate(overall: number, method?: ReasoningMethod): CalibratedScore {
    const window = this.recentWindow();
    const sameMethod = method ? window.filter((r) => r.reasoningMethod === method) : [];

    let pool: CalibrationRecord[] = [];
    if (sameMethod.length >= CALIBRATION.minRecordsForOffset) {
      pool = sameMethod;
    } else if (window.length >= CALIBRATION.minRecordsForOffset) {
      pool = window;
    }

    const adjustment = mean(pool.map((r) => r.adjustment));
    return {
      calibrated: clampToRange(overall + adjustment, this.range),
      adjustment,
    };
  }

  /**
   * Copy of the history, oldest first
   */
  getHistory(): CalibrationRecord[] {
    return [...this.history];
  }

  get size(): number {
    return this.history.length;
  }

  clear(): void {
    this.history = [];
  }

  private recentWindow(): CalibrationRecord[] {
    return lastN(this.history, this.metricsWindow);
  }

  private static validateOptions(options: CalibrationTrackerOptions): void {
    const { historyLimit, metricsWindow, recentAdjustments, ratingScale } = options;
    const parsed = CalibrationSettingsSchema.partial().safeParse({
      historyLimit,
      metricsWindow,
      recentAdjustments,
      ratingScale,
    });

    const issues = parsed.success
      ? []
      : parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    if (ratingScale && ratingScale.min >= ratingScale.max) {
      issues.push('ratingScale: rating scale min must be below max');
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid calibration options: ${issues.join('; ')}`, {
        context: { issues },
      });
    }
  }

  private validate(feedback: FeedbackInput): ValidationError | undefined {
    const { predictedConfidence, actualOutcome, userRating } = feedback;

    if (typeof predictedConfidence !== 'number' || !Number.isFinite(predictedConfidence) ||
        predictedConfidence < 0 || predictedConfidence > 1) {
      return new ValidationError(
        `predicted confidence must be a number in [0, 1], got ${String(predictedConfidence)}`,
        'predictedConfidence',
      );
    }
    if (typeof actualOutcome !== 'boolean') {
      return new ValidationError('actual outcome must be a boolean', 'actualOutcome');
    }
    const { min, max } = this.ratingScale;
    if (typeof userRating !== 'number' || !Number.isFinite(userRating) || userRating < min || userRating > max) {
      return new ValidationError(
        `user rating must be within ${min}-${max}, got ${String(userRating)}`,
        'userRating',
      );
    }
    return undefined;
  }
}

function lastN<T>(items: readonly T[], count: number): T[] {
  return items.slice(Math.max(0, items.length - count));
}
