/**
 * chain-confidence - Lexical indicator tables
 *
 * Classified keyword sets shared by every assessor. The default tables live in
 * data/lexicon.json; any assessor accepts a substitute Lexicon instead.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

const KeywordListSchema = z
  .array(z.string().trim().min(1))
  .transform((words) => words.map((word) => word.toLowerCase()));

const ContradictionPairSchema = z
  .tuple([z.string().trim().min(1), z.string().trim().min(1)])
  .transform(([a, b]) => [a.toLowerCase(), b.toLowerCase()] as const);

export const LexiconSchema = z.object({
  reasoning: z.object({
    strong: KeywordListSchema,
    moderate: KeywordListSchema,
    weak: KeywordListSchema,
  }),
  evidence: z.object({
    high: KeywordListSchema,
    medium: KeywordListSchema,
    low: KeywordListSchema,
    research: KeywordListSchema,
    citation: KeywordListSchema,
  }),
  coherence: z.object({
    connectors: KeywordListSchema,
    contradictionPairs: z.array(ContradictionPairSchema),
  }),
  assumptions: z.object({
    highRisk: KeywordListSchema,
    lowRisk: KeywordListSchema,
    uncertainty: KeywordListSchema,
  }),
});

type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type Lexicon = DeepReadonly<z.infer<typeof LexiconSchema>>;
export type KeywordList = readonly string[];

export const DEFAULT_LEXICON_PATH = new URL('../../data/lexicon.json', import.meta.url);

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw keyword tables and return an immutable Lexicon
 */
export function parseLexicon(data: unknown): Lexicon {
  const parsed = LexiconSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid lexicon tables', {
      context: {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
    });
  }
  return deepFreeze(parsed.data);
}

/**
 * Load keyword tables from a JSON file
 */
export function loadLexicon(path: string | URL = DEFAULT_LEXICON_PATH): Lexicon {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read lexicon from ${String(path)}`, { cause: error });
  }
  return parseLexicon(raw);
}

export const DEFAULT_LEXICON: Lexicon = loadLexicon();

/**
 * Number of distinct keywords that occur in the text (case-insensitive substring match)
 */
export function countKeywordHits(text: string, keywords: KeywordList): number {
  const lower = text.toLowerCase();
  let hits = 0;
  for (const keyword of keywords) {
    if (lower.includes(keyword)) hits++;
  }
  return hits;
}

export function containsAnyKeyword(text: string, keywords: KeywordList): boolean {
  return countKeywordHits(text, keywords) > 0;
}
