/**
 * Absential Types Package
 *
 * A "value not supplied" sentinel distinct from null and undefined, and an
 * immutable Cell for transforming such values without presence checks.
 *
 * @module @absential/types
 *
 * ## Architecture
 *
 * ### Core Library (`lib/`)
 * - **Absence**: `absent`, `AbsenceFactory`, `isAbsent`, `isPresent`
 * - **Cell**: construction, extraction, map/flatMap/filter, fallbacks
 * - **Schema**: zod helpers for optional input
 * - **Adapt**: option records to Absential parameters
 * - **Errors**: `OperationValidityError`, `EmptyCellError`
 */

export * from './lib/index.js';
