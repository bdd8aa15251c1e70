/**
 * @fileoverview Absence library
 *
 * - **Absence**: the `absent` sentinel, factory markers, narrowing predicates
 * - **Cell**: immutable container with map/flatMap/filter/fallback combinators
 * - **Equivalence**: SameValueZero equality and matching hashes
 * - **Schema**: zod helpers turning missing input into `absent` or a Cell
 * - **Adapt**: dropping omitted fields from option records
 * - **Errors**: error classes with stable codes
 *
 * @module @absential/types/lib
 */

// =============================================================================
// ABSENCE - Sentinel and Predicates
// =============================================================================
export {
  type AbsenceDisplay,
  type Absential,
  AbsenceFactory,
  AbsentSingleton,
  absent,
  canonicalAbsent,
  isAbsence,
  isAbsent,
  isPresent,
  assertPresent,
  absentialOr,
} from './absence.js';

// =============================================================================
// CELL - Optional Value Container
// =============================================================================
export { Cell, type CellPatterns, type FromNullableOptions } from './cell.js';

// =============================================================================
// EQUIVALENCE - Equality and Hashing
// =============================================================================
export {
  type Equivalence,
  type Hasher,
  sameValueZero,
  hashString,
  hashValue,
} from './equivalence.js';

// =============================================================================
// SCHEMA - Zod Integration
// =============================================================================
export {
  type AbsentialSchema,
  type CellSchema,
  absentialSchema,
  cellSchema,
} from './schema.js';

// =============================================================================
// ADAPT - Option Records
// =============================================================================
export {
  type AdaptOptions,
  type AdaptedRecord,
  type AdaptedRecordKeepingNull,
  adaptRecord,
} from './adapt.js';

// =============================================================================
// ERRORS
// =============================================================================
export {
  AbsenceError,
  OperationValidityError,
  AbsentValueError,
  EmptyCellError,
  isAbsenceError,
} from './errors.js';
