/**
 * Tokenizer Tests
 *
 * Tests cover: lowercase, punctuation stripping, whitespace splitting,
 * minimum length, concept normalization.
 */

import { Tokenizer, normalizeConcept, ENGLISH_STOPWORDS, DEFAULT_MIN_TOKEN_LENGTH } from '../Tokenizer';

describe('Tokenizer', () => {
  describe('Basic tokenization', () => {
    test('should lowercase and drop short words', () => {
      const tokenizer = new Tokenizer();
      expect(tokenizer.tokenize('What is the dose of Atezolizumab')).toEqual([
        'what',
        'the',
        'dose',
        'atezolizumab',
      ]);
    });

    test('should delete punctuation rather than split on it', () => {
      const tokenizer = new Tokenizer();
      expect(tokenizer.tokenize('PD-L1 in NSCLC?')).toEqual(['pdl1', 'nsclc']);
      expect(tokenizer.tokenize("patient's (HER2+) status")).toEqual(['patients', 'her2', 'status']);
    });

    test('should split on tabs and newlines', () => {
      const tokenizer = new Tokenizer();
      expect(tokenizer.tokenize('dose\tweeks\nthree')).toEqual(['dose', 'weeks', 'three']);
    });

    test('should keep duplicates in tokenize and drop them in normalize', () => {
      const tokenizer = new Tokenizer();
      expect(tokenizer.tokenize('dose dose DOSE')).toEqual(['dose', 'dose', 'dose']);
      expect(tokenizer.normalize('dose dose DOSE')).toEqual(new Set(['dose']));
    });

    test('should return empty results for empty input', () => {
      const tokenizer = new Tokenizer();
      expect(tokenizer.tokenize('')).toEqual([]);
      expect(tokenizer.tokenize('   \t\n  ')).toEqual([]);
      expect(tokenizer.tokenize(null)).toEqual([]);
      expect(tokenizer.tokenize(undefined)).toEqual([]);
      expect(tokenizer.normalize('').size).toBe(0);
    });

    test('should return empty set when every word is punctuation or short', () => {
      const tokenizer = new Tokenizer();
      expect(tokenizer.normalize('?! -- of in a').size).toBe(0);
    });
  });

  describe('Minimum length', () => {
    test('should default to three characters', () => {
      expect(DEFAULT_MIN_TOKEN_LENGTH).toBe(3);
      expect(new Tokenizer().tokenize('an the dose')).toEqual(['the', 'dose']);
    });

    test('should apply a custom minimum', () => {
      const tokenizer = new Tokenizer({ minLength: 5 });
      expect(tokenizer.tokenize('dose atezolizumab three')).toEqual(['atezolizumab', 'three']);
    });

    test('should measure length after punctuation is removed', () => {
      const tokenizer = new Tokenizer({ minLength: 4 });
      expect(tokenizer.tokenize('a.b.c pd-1 pd-l1')).toEqual(['pdl1']);
    });

    test('should reject a non-positive minimum', () => {
      expect(() => new Tokenizer({ minLength: 0 })).toThrow(RangeError);
      expect(() => new Tokenizer({ minLength: 2.5 })).toThrow(RangeError);
    });
  });

  describe('normalizeConcept', () => {
    test('should lowercase and strip punctuation', () => {
      expect(normalizeConcept(' PD-L1 ')).toBe('pdl1');
      expect(normalizeConcept('NSCLC')).toBe('nsclc');
    });

    test('should collapse inner whitespace', () => {
      expect(normalizeConcept('Small  Cell,\tLung')).toBe('small cell lung');
    });

    test('should return empty string for punctuation only', () => {
      expect(normalizeConcept(' -/- ')).toBe('');
    });
  });

  describe('Stopwords', () => {
    test('should load the English stopword list', () => {
      expect(ENGLISH_STOPWORDS.has('which')).toBe(true);
      expect(ENGLISH_STOPWORDS.has('does')).toBe(true);
      expect(ENGLISH_STOPWORDS.has('atezolizumab')).toBe(false);
    });

    test('should not be applied by the tokenizer', () => {
      expect(new Tokenizer().tokenize('which does')).toEqual(['which', 'does']);
    });
  });
});
