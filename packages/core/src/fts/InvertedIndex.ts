/**
 * Inverted Index
 *
 * Maps each token to the ascending ids of the documents whose prompt or
 * completion contains it. Also keeps the per-field token sets so the ranker
 * can recompute exact overlaps without tokenizing documents again.
 *
 * Built once per dataset and read-only afterwards.
 *
 * @module fts/InvertedIndex
 */

import type { ClinicalDocument } from '../documents/types';
import { Tokenizer } from './Tokenizer';

const EMPTY_POSTINGS: readonly number[] = Object.freeze([]);
const EMPTY_TOKENS: ReadonlySet<string> = new Set();

/**
 * Inverted Index
 *
 * @example
 * ```typescript
 * const index = InvertedIndex.build(store.all());
 * index.postings('atezolizumab'); // [0, 4, 9]
 * index.contains('nivolumab');    // false
 * ```
 */
export class InvertedIndex {
  /** token → ascending document ids */
  private readonly index: Map<string, number[]>;

  /** document id → distinct prompt tokens */
  private readonly promptTokenSets: ReadonlySet<string>[];

  /** document id → distinct completion tokens */
  private readonly completionTokenSets: ReadonlySet<string>[];

  /** Tokenizer used at build time; queries must use the same one */
  readonly tokenizer: Tokenizer;

  private constructor(tokenizer: Tokenizer) {
    this.index = new Map();
    this.promptTokenSets = [];
    this.completionTokenSets = [];
    this.tokenizer = tokenizer;
  }

  /**
   * Build an index over documents ordered by id.
   *
   * Linear in the total number of token occurrences.
   */
  static build(documents: readonly ClinicalDocument[], tokenizer: Tokenizer = new Tokenizer()): InvertedIndex {
    const built = new InvertedIndex(tokenizer);
    for (const doc of documents) {
      built.addDocument(doc);
    }
    return built;
  }

  private addDocument(doc: ClinicalDocument): void {
    if (doc.id !== this.promptTokenSets.length) {
      throw new RangeError(`Documents must be indexed in id order: expected ${this.promptTokenSets.length}, got ${doc.id}`);
    }

    const promptTokens = this.tokenizer.normalize(doc.prompt);
    const completionTokens = this.tokenizer.normalize(doc.completion);
    this.promptTokenSets.push(promptTokens);
    this.completionTokenSets.push(completionTokens);

    for (const tokens of [promptTokens, completionTokens]) {
      for (const token of tokens) {
        let postings = this.index.get(token);
        if (!postings) {
          postings = [];
          this.index.set(token, postings);
        }
        // Ids arrive in ascending order, so a repeat can only be the last entry.
        if (postings[postings.length - 1] !== doc.id) {
          postings.push(doc.id);
        }
      }
    }
  }

  /**
   * Ascending ids of documents containing the token.
   *
   * @returns Empty list if the token is unknown
   */
  postings(token: string): readonly number[] {
    return this.index.get(token) ?? EMPTY_POSTINGS;
  }

  contains(token: string): boolean {
    return this.index.has(token);
  }

  promptTokens(docId: number): ReadonlySet<string> {
    return this.promptTokenSets[docId] ?? EMPTY_TOKENS;
  }

  completionTokens(docId: number): ReadonlySet<string> {
    return this.completionTokenSets[docId] ?? EMPTY_TOKENS;
  }

  getTerms(): IterableIterator<string> {
    return this.index.keys();
  }

  getTermCount(): number {
    return this.index.size;
  }

  getTotalDocs(): number {
    return this.promptTokenSets.length;
  }
}
