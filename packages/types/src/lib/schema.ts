/**
 * @fileoverview Zod helpers that parse optional input into the absence paradigm
 *
 * A missing field (`undefined`) becomes {@link absent} or an empty Cell, while
 * an explicit `null` is left for the inner schema to accept or reject.
 *
 * @example
 * const UpdateSchema = z.object({
 *   nickname: absentialSchema(z.string().nullable()),
 *   maxColumns: cellSchema(z.number().int().positive()),
 * });
 *
 * const { nickname, maxColumns } = UpdateSchema.parse({ nickname: null });
 * // nickname === null, maxColumns.isAbsent() === true
 *
 * @module @absential/types/schema
 */

import { z } from 'zod';

import { absent, type Absential } from './absence.js';
import { Cell } from './cell.js';

export type AbsentialSchema<S extends z.ZodTypeAny> = z.ZodEffects<
  z.ZodOptional<S>,
  Absential<z.output<S>>
>;

export type CellSchema<S extends z.ZodTypeAny> = z.ZodEffects<z.ZodOptional<S>, Cell<z.output<S>>>;

/**
 * Parses `undefined` to `absent`, anything else through `schema`
 */
export function absentialSchema<S extends z.ZodTypeAny>(schema: S): AbsentialSchema<S> {
  return schema
    .optional()
    .transform((value): Absential<z.output<S>> => (value === undefined ? absent : value));
}

/**
 * Parses `undefined` to an empty Cell, anything else to an occupied one
 */
export function cellSchema<S extends z.ZodTypeAny>(schema: S): CellSchema<S> {
  return schema
    .optional()
    .transform((value): Cell<z.output<S>> =>
      value === undefined ? Cell.empty<z.output<S>>() : Cell.of<z.output<S>>(value)
    );
}
