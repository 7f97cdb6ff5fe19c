/**
 * Tests for StepQualityAssessor
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StepQualityAssessor, stepCountBonus } from '../../../src/core/assessors/StepQualityAssessor.js';
import { makeChain, makeStep, PLAIN_TEXT, plainSteps } from '../../fixtures/chains.js';

describe('StepQualityAssessor', () => {
  let assessor: StepQualityAssessor;

  beforeEach(() => {
    assessor = new StepQualityAssessor();
  });

  describe('scoreStep', () => {
    it('should start at the confidence floor', () => {
      expect(assessor.scoreStep(makeStep())).toBeCloseTo(0.7, 10);
    });

    it('should reward strong connectors', () => {
      const step = makeStep({ reasoning: 'Therefore the cache is warm because requests repeat.' });
      expect(assessor.scoreStep(step)).toBeCloseTo(0.76, 10);
    });

    it('should count each keyword once', () => {
      const step = makeStep({ reasoning: 'Therefore, and therefore again.' });
      expect(assessor.scoreStep(step)).toBeCloseTo(0.73, 10);
    });

    it('should reward moderate connectors', () => {
      const step = makeStep({ reasoning: 'The trace suggests a leak and indicates a retry storm.' });
      expect(assessor.scoreStep(step)).toBeCloseTo(0.74, 10);
    });

    it('should never drop below the floor for weak wording', () => {
      const step = makeStep({ reasoning: 'Maybe the disk is full, perhaps not.' });
      expect(assessor.scoreStep(step)).toBe(0.7);
    });

    it('should add length bonuses above 100 and 200 characters', () => {
      expect(assessor.scoreStep(makeStep({ reasoning: 'x'.repeat(150) }))).toBeCloseTo(0.72, 10);
      expect(assessor.scoreStep(makeStep({ reasoning: 'x'.repeat(250) }))).toBeCloseTo(0.74, 10);
    });

    it('should cap the evidence bonus', () => {
      expect(assessor.scoreStep(makeStep({ evidence: ['a', 'b'] }))).toBeCloseTo(0.74, 10);
      expect(assessor.scoreStep(makeStep({ evidence: ['a', 'b', 'c', 'd'] }))).toBeCloseTo(0.75, 10);
    });

    it('should reward acknowledged assumptions and penalize many of them', () => {
      expect(assessor.scoreStep(makeStep({ assumptions: ['a'] }))).toBeCloseTo(0.71, 10);
      expect(assessor.scoreStep(makeStep({ assumptions: ['a', 'b', 'c', 'd', 'e'] }))).toBe(0.7);
    });

    it('should blend a positive self-reported confidence', () => {
      expect(assessor.scoreStep(makeStep({ confidence: 0.9 }))).toBeCloseTo(0.8, 10);
    });

    it('should ignore a zero self-reported confidence', () => {
      expect(assessor.scoreStep(makeStep({ confidence: 0 }))).toBeCloseTo(0.7, 10);
    });

    it('should clamp to the confidence ceiling', () => {
      const step = makeStep({
        reasoning:
          'Therefore, consequently, this demonstrates and proves the point because it follows.',
        evidence: ['a', 'b', 'c'],
        confidence: 1,
      });
      expect(assessor.scoreStep(step)).toBe(0.95);
    });

    it('should honour a custom range', () => {
      const wide = new StepQualityAssessor({ range: { min: 0.5, max: 0.9 } });
      expect(wide.scoreStep(makeStep({ reasoning: PLAIN_TEXT }))).toBe(0.5);
    });
  });

  describe('assess', () => {
    it('should return the floor for a chain without steps', () => {
      expect(assessor.assess(makeChain({ steps: [] }))).toBe(0.7);
    });

    it('should add the method bonus', () => {
      const chain = makeChain({ steps: plainSteps(2), reasoningMethod: 'abductive' });
      expect(assessor.assess(chain)).toBeCloseTo(0.72, 10);
    });

    it('should weight later steps more heavily', () => {
      const chain = makeChain({
        reasoningMethod: 'inductive',
        steps: [makeStep({ stepNumber: 1 }), makeStep({ stepNumber: 2, confidence: 0.9 })],
      });
      // (0.70 * 1.1 + 0.80 * 1.2) / 2.3 + 0.03
      expect(assessor.assess(chain)).toBeCloseTo(1.73 / 2.3 + 0.03, 10);
    });

    it('should add the four-step bonus', () => {
      const chain = makeChain({ steps: plainSteps(4), reasoningMethod: 'abductive' });
      expect(assessor.assess(chain)).toBeCloseTo(0.75, 10);
    });

    it('should apply only the six-step bonus for long chains', () => {
      const chain = makeChain({ steps: plainSteps(6), reasoningMethod: 'abductive' });
      expect(assessor.assess(chain)).toBeCloseTo(0.77, 10);
    });
  });

  describe('stepCountBonus', () => {
    it('should pick the largest applicable tier', () => {
      expect(stepCountBonus(3)).toBe(0);
      expect(stepCountBonus(4)).toBe(0.03);
      expect(stepCountBonus(5)).toBe(0.03);
      expect(stepCountBonus(6)).toBe(0.05);
      expect(stepCountBonus(12)).toBe(0.05);
    });
  });
});
