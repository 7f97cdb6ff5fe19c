/**
 * chain-confidence - Human-readable explanations of a ConfidenceAnalysis
 */

import { TARGET_CONFIDENCE } from '../config/constants.js';
import type { ConfidenceAnalysis } from '../types/index.js';

function pct(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/**
 * Whether the overall score is high enough to act on
 */
export function meetsThreshold(analysis: ConfidenceAnalysis, threshold = TARGET_CONFIDENCE): boolean {
  return analysis.overall >= threshold;
}

export function verdictFor(overall: number): string {
  if (overall >= 0.9) return 'High confidence';
  if (overall >= 0.8) return 'Good confidence, minor reservations';
  return 'Moderate confidence, verify before acting';
}

/**
 * Multi-line report of every dimension
 */
export function explainAnalysis(analysis: ConfidenceAnalysis, threshold = TARGET_CONFIDENCE): string {
  const lines: string[] = [];

  lines.push(`=== CONFIDENCE: ${pct(analysis.overall)} ===`);
  lines.push(`Verdict: ${verdictFor(analysis.overall)}`);
  lines.push(`Actionable (>= ${pct(threshold)}): ${meetsThreshold(analysis, threshold) ? 'yes' : 'no'}`);
  lines.push('');
  lines.push('DIMENSIONS:');
  lines.push(`  Reasoning quality:    ${pct(analysis.reasoningConfidence)}`);
  lines.push(`  Evidence quality:     ${pct(analysis.evidenceConfidence)}`);
  lines.push(`  Source reliability:   ${pct(analysis.sourceReliability)}`);
  lines.push(`  Assumption certainty: ${pct(analysis.assumptionCertainty)}`);
  lines.push(`  Coherence:            ${pct(analysis.reasoningCoherence)}`);

  return lines.join('\n');
}

/**
 * Compact one-line summary
 */
export function summarizeAnalysis(analysis: ConfidenceAnalysis, threshold = TARGET_CONFIDENCE): string {
  const flag = meetsThreshold(analysis, threshold) ? 'OK' : '??';
  return (
    `[${flag}] ${pct(analysis.overall)} | ` +
    `R:${pct(analysis.reasoningConfidence)} E:${pct(analysis.evidenceConfidence)} ` +
    `S:${pct(analysis.sourceReliability)} A:${pct(analysis.assumptionCertainty)} ` +
    `Co:${pct(analysis.reasoningCoherence)}`
  );
}
