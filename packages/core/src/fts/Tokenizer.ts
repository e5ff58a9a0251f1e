/**
 * Tokenizer / Normalizer
 *
 * Turns prompts, completions and queries into token sets.
 * Features:
 * - Lowercasing
 * - Deletion of the ASCII punctuation set (so "PD-L1" becomes "pdl1")
 * - Whitespace splitting
 * - Configurable minimum token length
 *
 * The same Tokenizer instance must be used to build an index and to query it.
 *
 * @module fts/Tokenizer
 */

import type { TokenizerOptions } from './types';
import stopwordList from './stopwords.json';

/**
 * English stopwords. Not applied by the tokenizer itself; the knowledge
 * graph uses them to decide which terms are significant.
 */
export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set<string>(stopwordList);

/**
 * Characters deleted during normalization: !"#$%&'()*+,-./:;<=>?@[\]^_`{|}~
 */
export const PUNCTUATION_PATTERN = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/** Default minimum token length (tokens must be longer than two characters). */
export const DEFAULT_MIN_TOKEN_LENGTH = 3;

/**
 * Normalize a facet value (cancer type, gene) into a graph concept key.
 *
 * @example
 * ```typescript
 * normalizeConcept(' PD-L1 '); // 'pdl1'
 * normalizeConcept('Small  Cell Lung'); // 'small cell lung'
 * ```
 */
export function normalizeConcept(text: string): string {
  return text.toLowerCase().replace(PUNCTUATION_PATTERN, '').replace(/\s+/g, ' ').trim();
}

/**
 * Tokenizer
 *
 * @example
 * ```typescript
 * const tokenizer = new Tokenizer();
 * tokenizer.normalize('What is the dose of Atezolizumab?');
 * // Set { 'what', 'the', 'dose', 'atezolizumab' }
 * ```
 */
export class Tokenizer {
  readonly minLength: number;

  constructor(options?: TokenizerOptions) {
    const minLength = options?.minLength ?? DEFAULT_MIN_TOKEN_LENGTH;
    if (!Number.isInteger(minLength) || minLength < 1) {
      throw new RangeError(`minLength must be a positive integer, got ${minLength}`);
    }
    this.minLength = minLength;
  }

  /**
   * Tokenize text into an ordered list of tokens. Duplicates are kept.
   */
  tokenize(text: string | null | undefined): string[] {
    if (!text || typeof text !== 'string') {
      return [];
    }

    const words = text.toLowerCase().replace(PUNCTUATION_PATTERN, '').split(/\s+/);

    const tokens: string[] = [];
    for (const word of words) {
      if (word.length < this.minLength) {
        continue;
      }
      tokens.push(word);
    }
    return tokens;
  }

  /**
   * Tokenize text into a set of distinct tokens.
   */
  normalize(text: string | null | undefined): Set<string> {
    return new Set(this.tokenize(text));
  }
}
