import { describe, expect, test } from 'vitest';
import {
  ADMISSION_FLOOR,
  compilePatternBook,
  ConfidenceScorer,
  NEGATIVE_MULTIPLIER,
} from '../../../../src/engine/analysis/ConfidenceScorer.js';
import { rawElement } from '../../../helpers/elements.js';

const emailBook = compilePatternBook({
  patterns: {
    email: {
      names: ['e-?mail'],
      labels: ['e-?mail'],
      types: ['^email$'],
      autocompletes: ['^email$'],
    },
  },
  negatives: { email: ['confirm'] },
});

describe('ConfidenceScorer', () => {
  describe('with a hand-built pattern book', () => {
    const scorer = new ConfidenceScorer(emailBook);

    test('admits an email field recognised only by autocomplete', () => {
      const result = scorer.score(rawElement({ inputType: 'text', autocomplete: 'email' }), 'email');

      expect(result?.matched).toEqual(['autocompletes']);
      // 3.5 / (3.5 + 3.0 + 2)
      expect(result?.confidence).toBe(0.412);
      expect(result?.confidence).toBeGreaterThanOrEqual(0.4);
    });

    test('damps a negatively matched element by exactly the negative multiplier', () => {
      const result = scorer.score(rawElement({ name: 'confirm_email' }), 'email');

      expect(result?.penalized).toBe(true);
      expect(result?.raw).toBeCloseTo(2.2);
      expect(result?.score).toBeCloseTo(2.2 * NEGATIVE_MULTIPLIER);
      expect(result?.denominator).toBeCloseTo(7.2);
      expect(result?.confidence).toBe(0.092);
    });

    test('caps a strongly matched element at 1', () => {
      const result = scorer.score(
        rawElement({ inputType: 'email', name: 'email', id: 'email', labelText: 'Email', autocomplete: 'email' }),
        'email',
      );

      expect(result?.matched).toEqual(['names', 'labels', 'types', 'autocompletes']);
      expect(result?.confidence).toBe(1);
    });

    test('ignores categories whose source attributes are empty', () => {
      const result = scorer.score(rawElement({ inputType: '' }), 'email');

      expect(result?.denominator).toBe(2);
      expect(result?.confidence).toBe(0);
    });

    test('returns null for a type without patterns', () => {
      expect(scorer.score(rawElement({ name: 'phone' }), 'phone')).toBeNull();
    });

    test('lists only candidates above the admission floor', () => {
      expect(scorer.candidates(rawElement({ name: 'confirm_email' }))).toEqual([]);
      expect(scorer.candidates(rawElement({ scanIndex: 7, inputType: 'text', autocomplete: 'email' }))).toEqual([
        { scanIndex: 7, fieldType: 'email', confidence: 0.412 },
      ]);
    });
  });

  describe('with the bundled pattern book', () => {
    const scorer = new ConfidenceScorer();

    test('keeps every confidence within [0, 1]', () => {
      const elements = [
        rawElement({ inputType: 'email', name: 'email', labelText: 'Email address', autocomplete: 'email' }),
        rawElement({ name: 'first_name', labelText: 'First name', placeholder: 'Given name' }),
        rawElement({ inputType: 'tel', name: 'phone', labelText: 'Mobile phone', autocomplete: 'tel' }),
        rawElement({ inputType: 'file', name: 'resume', labelText: 'Resume/CV', contextText: 'Upload your resume' }),
        rawElement({ tag: 'textarea', inputType: 'textarea', name: 'message', labelText: 'Message' }),
        rawElement({ name: 'confirm_email', labelText: 'Confirm email' }),
        rawElement(),
      ];

      for (const element of elements) {
        for (const candidate of scorer.candidates(element)) {
          expect(candidate.confidence).toBeGreaterThan(ADMISSION_FLOOR);
          expect(candidate.confidence).toBeLessThanOrEqual(1);
        }
      }
    });

    test('scores a labelled first-name input above the default threshold', () => {
      const result = scorer.score(
        rawElement({ name: 'firstName', id: 'firstName', labelText: 'First Name' }),
        'first_name',
      );

      // 4.7 / (4.7 + 2)
      expect(result?.confidence).toBe(0.701);
    });

    test('penalizes the first-name pattern on a last-name input', () => {
      const result = scorer.score(rawElement({ name: 'last_name', labelText: 'Last name' }), 'first_name');

      expect(result?.penalized).toBe(true);
    });
  });
});
