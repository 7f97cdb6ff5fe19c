/**
 * chain-confidence - Calibration types
 */

import type { ReasoningMethod } from './reasoning.js';

/**
 * One outcome reported for a previously scored chain
 */
export interface CalibrationRecord {
  predictedConfidence: number;
  actualOutcome: boolean;
  userRating: number;
  /** Signed correction computed when the record was stored */
  adjustment: number;
  timestamp: Date;
  reasoningMethod?: ReasoningMethod;
  query?: string;
}

export interface CalibrationSummary {
  status: 'ok';
  /** Records currently held in the bounded history */
  totalRecords: number;
  /** Records the metrics below were computed from */
  sampleSize: number;
  calibrationAccuracy: number;
  averageAdjustment: number;
  averageUserRating: number;
  recentAdjustments: number[];
}

export interface EmptyCalibrationSummary {
  status: 'no_data';
  message: string;
}

export type CalibrationMetrics = CalibrationSummary | EmptyCalibrationSummary;

export interface CalibratedScore {
  calibrated: number;
  adjustment: number;
}
