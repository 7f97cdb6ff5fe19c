/**
 * chain-confidence - Reasoning chain validation
 * Turns untrusted input into a typed ReasoningChain or a MalformedInputError
 */

import { z } from 'zod';
import { REASONING_METHODS, type ReasoningChain } from '../types/index.js';
import { MalformedInputError } from './errors.js';

const unitScore = z.number().min(0).max(1);

export const ReasoningStepSchema = z.object({
  stepNumber: z.number().int().positive(),
  description: z.string().default(''),
  reasoning: z.string().min(1, 'reasoning must not be empty'),
  confidence: unitScore.optional(),
  evidence: z.array(z.string()).default([]),
  assumptions: z.array(z.string()).default([]),
});

export const ReasoningChainSchema = z
  .object({
    query: z.string(),
    steps: z.array(ReasoningStepSchema),
    finalConclusion: z.string().default(''),
    reasoningMethod: z.enum(REASONING_METHODS).default('deductive'),
    overallConfidence: unitScore.optional(),
    evidenceQuality: unitScore.optional(),
    assumptionRisk: unitScore.optional(),
  })
  .superRefine((chain, ctx) => {
    const seen = new Set<number>();
    chain.steps.forEach((step, index) => {
      if (seen.has(step.stepNumber)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'stepNumber'],
          message: `duplicate step number ${step.stepNumber}`,
        });
      }
      seen.add(step.stepNumber);

      const previous = chain.steps[index - 1];
      if (previous && step.stepNumber < previous.stepNumber) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'stepNumber'],
          message: 'step numbers must not decrease',
        });
      }
    });
  });

/**
 * Validate untrusted input as a reasoning chain
 */
export function parseReasoningChain(input: unknown): ReasoningChain {
  const parsed = ReasoningChainSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new MalformedInputError(`Malformed reasoning chain: ${issues[0]}`, issues);
  }
  return parsed.data;
}
