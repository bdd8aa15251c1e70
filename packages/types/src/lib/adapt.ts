/**
 * @fileoverview Adapting option records to functions with Absential parameters
 *
 * Argument parsers report an omitted flag as `undefined` (sometimes `null`).
 * `adaptRecord` drops those fields so that destructuring defaults of
 * `absent` take over on the receiving side.
 *
 * @example
 * function updateUser({
 *   name = absent,
 *   email = absent,
 * }: { name?: Absential<string>; email?: Absential<string | null> }) { ... }
 *
 * updateUser(adaptRecord(cliArgs)); // omitted flags arrive as absent
 *
 * @module @absential/types/adapt
 */

import { isAbsence, type AbsenceFactory } from './absence.js';
import { OperationValidityError } from './errors.js';

export interface AdaptOptions {
  /** Keep explicit nulls instead of dropping them (default: false) */
  readonly keepNull?: boolean;
}

/**
 * Fields that survive adaptation with nulls dropped
 */
export type AdaptedRecord<T> = {
  [K in keyof T]?: Exclude<T[K], null | undefined | AbsenceFactory>;
};

/**
 * Fields that survive adaptation with nulls kept
 */
export type AdaptedRecordKeepingNull<T> = {
  [K in keyof T]?: Exclude<T[K], undefined | AbsenceFactory>;
};

function isRecord(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a shallow copy of `record` without its omitted fields: undefined
 * ones, null ones unless `keepNull` is set, and absence markers.
 *
 * @throws {OperationValidityError} if `record` is not a plain object
 */
export function adaptRecord<T extends object>(
  record: T,
  options?: AdaptOptions & { readonly keepNull?: false }
): AdaptedRecord<T>;
export function adaptRecord<T extends object>(
  record: T,
  options: AdaptOptions & { readonly keepNull: true }
): AdaptedRecordKeepingNull<T>;
export function adaptRecord<T extends object>(
  record: T,
  options: AdaptOptions
): AdaptedRecord<T> | AdaptedRecordKeepingNull<T>;
export function adaptRecord<T extends object>(
  record: T,
  options: AdaptOptions = {}
): AdaptedRecord<T> | AdaptedRecordKeepingNull<T> {
  if (!isRecord(record)) {
    throw new OperationValidityError('adaptRecord');
  }
  const { keepNull = false } = options;

  const adapted: Record<string, unknown> = {};
  const entries: [string, unknown][] = Object.entries(record);
  for (const [key, value] of entries) {
    if (value === undefined || isAbsence(value)) continue;
    if (value === null && !keepNull) continue;
    adapted[key] = value;
  }
  return adapted as unknown as AdaptedRecordKeepingNull<T>;
}
