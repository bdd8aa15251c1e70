import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Cell } from '../lib/cell.js';

/**
 * Property-Based Tests for Cell
 *
 * These tests verify the algebraic laws the combinators promise.
 *
 * Key properties tested:
 * 1. Functor laws: identity and composition for map
 * 2. Monad laws: left identity, right identity, associativity for flatMap
 * 3. Fallbacks: orElse picks the first occupied cell
 * 4. Conversion: nullable round trip
 * 5. Equality and hashing agree
 */

const cellArb: fc.Arbitrary<Cell<number>> = fc
  .option(fc.integer(), { freq: 3 })
  .map((value) => Cell.fromNullable(value));

const halveEven = (x: number): Cell<number> => (x % 2 === 0 ? Cell.of(x / 2) : Cell.empty());

const positive = (x: number): Cell<number> => (x > 0 ? Cell.of(x) : Cell.empty());

describe('Cell - Functor laws', () => {
  it('should preserve identity', () => {
    fc.assert(
      fc.property(cellArb, (cell) => {
        expect(cell.map((x) => x).equals(cell)).toBe(true);
      })
    );
  });

  it('should map occupied cells to of(f(v))', () => {
    fc.assert(
      fc.property(fc.integer(), fc.func(fc.integer()), (value, f) => {
        expect(Cell.of(value).map(f).equals(Cell.of(f(value)))).toBe(true);
      })
    );
  });

  it('should map empty cells to empty', () => {
    fc.assert(
      fc.property(fc.func(fc.integer()), (f) => {
        expect(Cell.empty<number>().map(f).equals(Cell.empty())).toBe(true);
      })
    );
  });

  it('should compose', () => {
    fc.assert(
      fc.property(cellArb, fc.func(fc.integer()), fc.func(fc.string()), (cell, f, g) => {
        const stepwise = cell.map(f).map(g);
        const composed = cell.map((x) => g(f(x)));

        expect(stepwise.equals(composed)).toBe(true);
      })
    );
  });
});

describe('Cell - Monad laws', () => {
  it('should satisfy left identity', () => {
    fc.assert(
      fc.property(fc.integer(), (value) => {
        expect(Cell.of(value).flatMap(halveEven).equals(halveEven(value))).toBe(true);
      })
    );
  });

  it('should satisfy right identity', () => {
    fc.assert(
      fc.property(cellArb, (cell) => {
        expect(cell.flatMap(Cell.of).equals(cell)).toBe(true);
      })
    );
  });

  it('should satisfy associativity', () => {
    fc.assert(
      fc.property(cellArb, (cell) => {
        const nested = cell.flatMap(halveEven).flatMap(positive);
        const flattened = cell.flatMap((x) => halveEven(x).flatMap(positive));

        expect(nested.equals(flattened)).toBe(true);
      })
    );
  });

  it('should keep empty cells empty', () => {
    fc.assert(
      fc.property(fc.func(fc.integer()), (f) => {
        expect(
          Cell.empty<number>()
            .flatMap((x) => Cell.of(f(x)))
            .isAbsent()
        ).toBe(true);
      })
    );
  });
});

describe('Cell - Filter', () => {
  it('should be occupied exactly when the predicate holds', () => {
    fc.assert(
      fc.property(cellArb, fc.integer(), (cell, threshold) => {
        const predicate = (x: number): boolean => x > threshold;

        expect(cell.filter(predicate).isOccupied()).toBe(cell.evaluateOrFalse(predicate));
      })
    );
  });
});

describe('Cell - Fallbacks', () => {
  it('should resolve an orElse chain to the first occupied cell', () => {
    fc.assert(
      fc.property(fc.array(cellArb, { maxLength: 8 }), (cells) => {
        const chained = cells.reduce((acc, next) => acc.orElse(next), Cell.empty<number>());
        const firstOccupied = cells.find((cell) => cell.isOccupied());

        if (firstOccupied === undefined) {
          expect(chained.isAbsent()).toBe(true);
        } else {
          expect(chained).toBe(firstOccupied);
        }
      })
    );
  });

  it('should agree between orElse and orCompute', () => {
    fc.assert(
      fc.property(cellArb, cellArb, (cell, alternative) => {
        expect(cell.orCompute(() => alternative)).toBe(cell.orElse(alternative));
      })
    );
  });
});

describe('Cell - Conversion', () => {
  it('should round-trip through nullable', () => {
    fc.assert(
      fc.property(cellArb, (cell) => {
        expect(Cell.fromNullable(cell.toNullable()).equals(cell)).toBe(true);
      })
    );
  });

  it('should agree between extractOr and toNullable', () => {
    fc.assert(
      fc.property(cellArb, fc.integer(), (cell, fallback) => {
        expect(cell.extractOr(fallback)).toBe(cell.toNullable() ?? fallback);
      })
    );
  });
});

describe('Cell - Equality and hashing', () => {
  it('should hash equal cells equally', () => {
    fc.assert(
      fc.property(cellArb, cellArb, (left, right) => {
        if (left.equals(right)) {
          expect(left.hashCode()).toBe(right.hashCode());
        }
      })
    );
  });

  it('should be symmetric', () => {
    fc.assert(
      fc.property(cellArb, cellArb, (left, right) => {
        expect(left.equals(right)).toBe(right.equals(left));
      })
    );
  });
});
