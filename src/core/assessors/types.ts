import type { Lexicon } from '../../config/lexicon.js';
import type { ConfidenceRange } from '../../types/index.js';

/**
 * Shared assessor configuration. Omitted fields fall back to the default
 * lexicon and the default confidence range.
 */
export interface AssessorOptions {
  lexicon?: Lexicon;
  range?: ConfidenceRange;
}
