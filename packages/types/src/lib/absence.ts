/**
 * @fileoverview Absence Sentinel - "not supplied" as a value
 *
 * `absent` marks a parameter or slot the caller did not supply. Unlike `null`
 * and `undefined` it never arrives by accident (from JSON, a missing key, an
 * unset variable), so `null` stays available as an explicit value.
 *
 * @example
 * function update(name: Absential<string | null> = absent) {
 *   if (isAbsent(name)) return; // caller did not touch the name
 *   save({ name }); // name is string | null here
 * }
 *
 * @module @absential/types/absence
 */

import { inspect } from 'node:util';

import { AbsentValueError, OperationValidityError } from './errors.js';

// =============================================================================
// MARKER TYPES
// =============================================================================

/**
 * Display hooks for a marker, fixed at construction
 */
export interface AbsenceDisplay {
  /** Renders the marker for `String(marker)` and template literals */
  readonly format?: (marker: AbsenceFactory) => string;
  /** Renders the marker for `util.inspect` and `console.log` */
  readonly inspect?: (marker: AbsenceFactory) => string;
}

/**
 * Produces arbitrary absence markers.
 *
 * Every instance is distinct from every other one and from the global
 * {@link absent}; use one when a module needs a private "not supplied" value
 * that must never be confused with the shared sentinel.
 */
export class AbsenceFactory {
  private readonly display: AbsenceDisplay;

  constructor(display: AbsenceDisplay = {}) {
    this.display = display;
    // Subclasses freeze once their own fields exist
    if (new.target === AbsenceFactory) Object.freeze(this);
  }

  /**
   * Markers are falsy wherever JavaScript consults `valueOf`
   * (`absent == false`, `Number(absent) === 0`). Object truthiness itself
   * cannot be overridden: test with {@link isAbsent}, never `if (value)`.
   */
  valueOf(): false {
    return false;
  }

  toString(): string {
    return this.display.format?.(this) ?? 'absence';
  }

  [inspect.custom](): string {
    return this.display.inspect?.(this) ?? 'absence.AbsenceFactory()';
  }

  /**
   * Markers must not cross process boundaries: a deserializer would mint a
   * second object claiming to be the canonical one.
   */
  toJSON(): never {
    throw new OperationValidityError('toJSON');
  }
}

/**
 * Type of the one global absence sentinel
 */
export class AbsentSingleton extends AbsenceFactory {
  private static shared: AbsentSingleton | undefined;

  // Keeps the type nominal so a plain AbsenceFactory never narrows to it
  private readonly canonical = true;

  private constructor() {
    super();
    Object.freeze(this);
  }

  /**
   * Returns the process-wide instance, creating it on first use
   */
  static instance(): AbsentSingleton {
    if (AbsentSingleton.shared === undefined) {
      AbsentSingleton.shared = new AbsentSingleton();
    }
    return AbsentSingleton.shared;
  }

  override toString(): string {
    return 'absent';
  }

  override [inspect.custom](): string {
    return 'absence.absent';
  }
}

/**
 * Global absence sentinel
 */
export const absent: AbsentSingleton = AbsentSingleton.instance();

/**
 * A value of type T, or the global absence sentinel
 */
export type Absential<T> = T | AbsentSingleton;

/**
 * Returns the global absence sentinel
 */
export function canonicalAbsent(): AbsentSingleton {
  return AbsentSingleton.instance();
}

// =============================================================================
// NARROWING PREDICATES
// =============================================================================

/**
 * Checks if value is any absence marker, the global one or a factory-made one
 */
export function isAbsence(value: unknown): value is AbsenceFactory {
  return value instanceof AbsenceFactory;
}

/**
 * Checks if value is the global absence sentinel (identity, not type)
 */
export function isAbsent(value: unknown): value is AbsentSingleton {
  return value === absent;
}

/**
 * Checks if an Absential value was supplied
 */
export function isPresent<T>(value: Absential<T>): value is T {
  return value !== absent;
}

/**
 * Asserts an Absential value was supplied
 */
export function assertPresent<T>(value: Absential<T>, message?: string): asserts value is T {
  if (isAbsent(value)) {
    throw new AbsentValueError(message);
  }
}

/**
 * Returns the value if supplied, otherwise the fallback
 */
export function absentialOr<T>(value: Absential<T>, fallback: T): T {
  return isPresent(value) ? value : fallback;
}
