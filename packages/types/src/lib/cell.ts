/**
 * @fileoverview Cell - immutable container for an Absential value
 *
 * A Cell is either occupied (holds a T) or empty (holds {@link absent}). It
 * never changes after construction: every combinator returns a new Cell, or
 * the same one when nothing changes.
 *
 * Laws (checked by the property tests):
 * - `Cell.empty().map(f)` equals `Cell.empty()`
 * - `Cell.of(v).map(f)` equals `Cell.of(f(v))`
 * - `Cell.of(v).flatMap(f)` equals `f(v)`
 * - `cell.flatMap(Cell.of)` equals `cell`
 *
 * Callbacks run synchronously and at most once; whatever they throw
 * propagates as is.
 *
 * @example
 * const width = Cell.fromNullable(options.maxColumns)
 *   .filter((n) => n > 0)
 *   .map((n) => n - 4)
 *   .extractOr(80);
 *
 * @module @absential/types/cell
 */

import { inspect } from 'node:util';

import { absent, isPresent, type Absential } from './absence.js';
import { type Equivalence, type Hasher, hashValue, sameValueZero } from './equivalence.js';
import { EmptyCellError } from './errors.js';

const EMPTY_HASH = hashValue(absent);

export interface FromNullableOptions {
  /** Treat null and undefined as "not supplied" (default: true) */
  readonly noneIsAbsent?: boolean;
}

/**
 * Handlers for {@link Cell.match}
 */
export interface CellPatterns<T, U> {
  present: (value: T) => U;
  absent: () => U;
}

export class Cell<T> {
  private readonly slot: Absential<T>;

  private constructor(slot: Absential<T>) {
    this.slot = slot;
    Object.freeze(this);
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  /**
   * Creates an occupied cell. Passing {@link absent} itself yields an empty one.
   */
  static of<T>(value: T): Cell<T> {
    return new Cell<T>(value);
  }

  static empty<T = never>(): Cell<T> {
    return new Cell<T>(absent);
  }

  /**
   * Wraps a raw Absential value: empty iff it is the global sentinel
   */
  static fromAbsential<T>(value: Absential<T>): Cell<T> {
    return new Cell<T>(value);
  }

  /**
   * Creates a cell from a nullable value.
   *
   * By default null and undefined become an empty cell, which suits values
   * coming from APIs that use them for "not given". With
   * `noneIsAbsent: false` they are stored as ordinary values.
   */
  static fromNullable<T>(
    value: T | null | undefined,
    options?: FromNullableOptions & { readonly noneIsAbsent?: true }
  ): Cell<T>;
  static fromNullable<T>(
    value: T | null | undefined,
    options: FromNullableOptions & { readonly noneIsAbsent: false }
  ): Cell<T | null | undefined>;
  static fromNullable<T>(
    value: T | null | undefined,
    options: FromNullableOptions
  ): Cell<T> | Cell<T | null | undefined>;
  static fromNullable<T>(
    value: T | null | undefined,
    options: FromNullableOptions = {}
  ): Cell<T> | Cell<T | null | undefined> {
    const { noneIsAbsent = true } = options;
    if (!noneIsAbsent) {
      return new Cell<T | null | undefined>(value);
    }
    return value === null || value === undefined ? Cell.empty<T>() : Cell.of<T>(value);
  }

  // ---------------------------------------------------------------------------
  // Predicates
  // ---------------------------------------------------------------------------

  isAbsent(): boolean {
    return !isPresent(this.slot);
  }

  isOccupied(): boolean {
    return isPresent(this.slot);
  }

  /**
   * The raw slot, for passing on to functions taking Absential parameters
   */
  get value(): Absential<T> {
    return this.slot;
  }

  // ---------------------------------------------------------------------------
  // Extraction
  // ---------------------------------------------------------------------------

  /**
   * @throws {EmptyCellError} if the cell is empty
   */
  extract(): T {
    if (isPresent(this.slot)) return this.slot;
    throw new EmptyCellError();
  }

  extractOr(fallback: T): T {
    return isPresent(this.slot) ? this.slot : fallback;
  }

  /**
   * Like {@link extractOr}, but only builds the fallback when the cell is empty
   */
  extractOrCompute(factory: () => T): T {
    return isPresent(this.slot) ? this.slot : factory();
  }

  // ---------------------------------------------------------------------------
  // Evaluation
  // ---------------------------------------------------------------------------

  evaluateOr<U>(fn: (value: T) => U, fallback: U): U {
    return isPresent(this.slot) ? fn(this.slot) : fallback;
  }

  /**
   * Applies the predicate, or passes when empty ("no limit set" means fits)
   *
   * @example
   * if (maxColumns.evaluateOrTrue((n) => line.length <= n)) lines.push(line);
   */
  evaluateOrTrue(predicate: (value: T) => boolean): boolean {
    return this.evaluateOr(predicate, true);
  }

  evaluateOrFalse(predicate: (value: T) => boolean): boolean {
    return this.evaluateOr(predicate, false);
  }

  // ---------------------------------------------------------------------------
  // Transformation
  // ---------------------------------------------------------------------------

  map<U>(fn: (value: T) => U): Cell<U> {
    return isPresent(this.slot) ? Cell.of(fn(this.slot)) : Cell.empty<U>();
  }

  /**
   * Like {@link map} for functions that already return a Cell; the result is
   * not wrapped again
   */
  flatMap<U>(fn: (value: T) => Cell<U>): Cell<U> {
    return isPresent(this.slot) ? fn(this.slot) : Cell.empty<U>();
  }

  filter(predicate: (value: T) => boolean): Cell<T> {
    if (isPresent(this.slot) && predicate(this.slot)) return this;
    return Cell.empty<T>();
  }

  // ---------------------------------------------------------------------------
  // Fallback
  // ---------------------------------------------------------------------------

  /**
   * @example
   * const effective = userPref.orElse(projectDefault).orElse(Cell.of(80));
   */
  orElse(alternative: Cell<T>): Cell<T> {
    return isPresent(this.slot) ? this : alternative;
  }

  orCompute(factory: () => Cell<T>): Cell<T> {
    return isPresent(this.slot) ? this : factory();
  }

  // ---------------------------------------------------------------------------
  // Conversion
  // ---------------------------------------------------------------------------

  /**
   * Inverse of {@link Cell.fromNullable} for cells whose T excludes null
   */
  toNullable(): T | null {
    return isPresent(this.slot) ? this.slot : null;
  }

  toUndefined(): T | undefined {
    return isPresent(this.slot) ? this.slot : undefined;
  }

  match<U>(patterns: CellPatterns<T, U>): U {
    return isPresent(this.slot) ? patterns.present(this.slot) : patterns.absent();
  }

  // ---------------------------------------------------------------------------
  // Equality, hashing, display
  // ---------------------------------------------------------------------------

  /**
   * Both empty, or both occupied with equal values. The default equivalence
   * is SameValueZero, except that nested cells compare structurally.
   */
  equals(other: Cell<T>, eq: Equivalence<T> = valueEquals): boolean {
    if (isPresent(this.slot) && isPresent(other.slot)) {
      return eq(this.slot, other.slot);
    }
    return !isPresent(this.slot) && !isPresent(other.slot);
  }

  /**
   * Empty cells share one hash; occupied cells hash as their value. Pass a
   * hasher consistent with the equivalence given to {@link equals}.
   */
  hashCode(hash: Hasher<T> = valueHash): number {
    return isPresent(this.slot) ? hash(this.slot) : EMPTY_HASH;
  }

  toString(): string {
    return isPresent(this.slot) ? `Cell(${inspect(this.slot)})` : 'Cell()';
  }

  [inspect.custom](): string {
    return this.toString();
  }

  /**
   * Serializes as the nullable value, so `Cell.fromNullable(JSON.parse(...))`
   * restores the cell
   */
  toJSON(): T | null {
    return this.toNullable();
  }
}

function valueEquals(left: unknown, right: unknown): boolean {
  if (left instanceof Cell && right instanceof Cell) return left.equals(right);
  return sameValueZero(left, right);
}

function valueHash(value: unknown): number {
  return value instanceof Cell ? value.hashCode() : hashValue(value);
}
