/**
 * Property-based tests for the Validator
 */

import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { Validator } from '../../src/validator';

const letters = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'.split('');

const lettersGenerator = fc.stringOf(fc.constantFrom(...letters), { minLength: 1, maxLength: 30 });

const fieldNameGenerator = fc.stringOf(fc.constantFrom(...'abcdefghij_'.split('')), { minLength: 1, maxLength: 8 });

// Digit-only names are array-index keys on plain objects
const mixedFieldNameGenerator = fc.oneof(
  fieldNameGenerator,
  fc.integer({ min: 0, max: 999 }).map(String)
);

describe('Validator properties', () => {
  /**
   * Data that satisfies every listed rule always passes with no messages.
   */
  test('satisfied rules produce no errors', () => {
    fc.assert(
      fc.property(fc.dictionary(fieldNameGenerator, lettersGenerator, { minKeys: 1, maxKeys: 6 }), (data) => {
        const rules = Object.fromEntries(Object.keys(data).map((field) => [field, 'required|alfa|alfa_num|min:1|max:31']));
        const validator = new Validator(data);

        validator.validate(rules);

        expect(validator.passed()).toBe(true);
        expect(validator.all()).toEqual([]);
      }),
      { numRuns: 100 }
    );
  });

  /**
   * min:N accepts a length iff length >= N; max:N accepts it iff length < N.
   */
  test('min and max split at the same boundary', () => {
    fc.assert(
      fc.property(lettersGenerator, fc.integer({ min: 0, max: 40 }), (value, limit) => {
        const minValidator = new Validator({ value });
        const maxValidator = new Validator({ value });

        minValidator.validate({ value: `min:${limit}` });
        maxValidator.validate({ value: `max:${limit}` });

        expect(minValidator.passed()).toBe(value.length >= limit);
        expect(maxValidator.passed()).toBe(value.length < limit);
        expect(minValidator.passed()).not.toBe(maxValidator.passed());
      }),
      { numRuns: 200 }
    );
  });

  /**
   * Every listed rule runs: k failing rules give k messages.
   */
  test('rules on a field never short-circuit', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), (count) => {
        const validator = new Validator({ name: '' });

        validator.validate({ name: Array(count).fill('required').join('|') });

        expect(validator.all()).toHaveLength(count);
      }),
      { numRuns: 50 }
    );
  });

  /**
   * all() is the grouped errors flattened in field order.
   */
  test('all() flattens getErrors() in order', () => {
    fc.assert(
      fc.property(fc.uniqueArray(mixedFieldNameGenerator, { minLength: 1, maxLength: 6 }), (fields) => {
        const validator = new Validator({});

        // One call per field so failures arrive in the generated order
        for (const field of fields) {
          validator.validate({ [field]: 'required|alfa' });
        }

        expect([...validator.getErrors().keys()]).toEqual(fields);
        expect(validator.all()).toEqual([...validator.getErrors().values()].flat());
        expect(validator.all()).toHaveLength(fields.length * 2);
      }),
      { numRuns: 100 }
    );
  });

  /**
   * A second validate call appends; nothing is reset.
   */
  test('errors accumulate across calls', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 10 }), (value) => {
        const validator = new Validator({ value });

        validator.validate({ value: 'alfa|min:12' });
        const firstRun = validator.all();
        validator.validate({ value: 'alfa|min:12' });

        expect(validator.all()).toEqual([...firstRun, ...firstRun]);
      }),
      { numRuns: 100 }
    );
  });
});
