/**
 * Tests for EvidenceQualityAssessor
 */

import { describe, it, expect } from 'vitest';
import { EvidenceQualityAssessor } from '../../../src/core/assessors/EvidenceQualityAssessor.js';
import { makeChain, makeStep, plainSteps } from '../../fixtures/chains.js';

describe('EvidenceQualityAssessor', () => {
  const assessor = new EvidenceQualityAssessor();

  describe('scoreEvidence', () => {
    it('should score neutral text at the base', () => {
      expect(assessor.scoreEvidence('Load testing results')).toBe(0.5);
    });

    it('should reward high-quality keywords', () => {
      expect(assessor.scoreEvidence('peer-reviewed and verified')).toBeCloseTo(0.8, 10);
    });

    it('should reward medium-quality keywords', () => {
      expect(assessor.scoreEvidence('Latency reported by ops')).toBeCloseTo(0.58, 10);
    });

    it('should penalize low-quality keywords', () => {
      expect(assessor.scoreEvidence('alleged leak')).toBeCloseTo(0.4, 10);
    });

    it('should reward research and citation markers', () => {
      expect(assessor.scoreEvidence('Survey data')).toBeCloseTo(0.6, 10);
      expect(assessor.scoreEvidence('See reference manual')).toBeCloseTo(0.55, 10);
    });

    it('should reward longer citations', () => {
      expect(assessor.scoreEvidence('x'.repeat(60))).toBeCloseTo(0.55, 10);
      expect(assessor.scoreEvidence('x'.repeat(120))).toBeCloseTo(0.6, 10);
    });

    it('should clamp to 1', () => {
      expect(
        assessor.scoreEvidence('peer-reviewed verified measured controlled replicated published'),
      ).toBe(1);
    });

    it('should clamp to 0', () => {
      expect(assessor.scoreEvidence('alleged rumored anecdotal hearsay speculated spin')).toBe(0);
    });
  });

  describe('assess', () => {
    it('should be neutral when no step carries evidence', () => {
      expect(assessor.assess(makeChain({ steps: plainSteps(3) }))).toBe(0.5);
    });

    it('should add a bonus for evidence spread across steps', () => {
      const chain = makeChain({
        steps: [makeStep({ stepNumber: 1, evidence: ['alleged leak'] }), makeStep({ stepNumber: 2 })],
      });
      expect(assessor.assess(chain)).toBeCloseTo(0.45, 10);
    });

    it('should give the full distribution bonus when every step has evidence', () => {
      const chain = makeChain({ steps: plainSteps(2, { evidence: ['Load testing results'] }) });
      expect(assessor.assess(chain)).toBeCloseTo(0.6, 10);
    });

    it('should increase when high-quality evidence is added', () => {
      const base = makeChain({
        steps: [makeStep({ stepNumber: 1, evidence: ['Load testing results'] }), makeStep({ stepNumber: 2 })],
      });
      const stronger = makeChain({
        steps: [
          makeStep({ stepNumber: 1, evidence: ['Load testing results', 'peer-reviewed and verified'] }),
          makeStep({ stepNumber: 2 }),
        ],
      });

      expect(assessor.assess(base)).toBeCloseTo(0.55, 10);
      expect(assessor.assess(stronger)).toBeCloseTo(0.7, 10);
      expect(assessor.assess(stronger)).toBeGreaterThan(assessor.assess(base));
    });
  });
});
