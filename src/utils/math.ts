/**
 * chain-confidence - Numeric helpers
 */

import type { ConfidenceRange } from '../types/index.js';

/**
 * Force a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clampUnit(value: number): number {
  return clamp(value, 0, 1);
}

export function clampToRange(value: number, range: ConfidenceRange): number {
  return clamp(value, range.min, range.max);
}

/**
 * Arithmetic mean (0 for an empty list)
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation (0 for fewer than two values)
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}
