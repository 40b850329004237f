/**
 * Runtime validation for values crossing the public API.
 *
 * Setters accept `unknown` at the boundary (values arrive from UI bindings and
 * host callbacks) and reject the whole call before any state is touched.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/EditorErrors.js';
import type { RowId } from '../types/index.js';

export const rowIdSchema = z.number().int().nonnegative();
export const rowIdsSchema = z.array(rowIdSchema);
export const patternSchema = z.string();
export const amountSchema = z.number().finite();

function parseWith<T>(schema: z.ZodType<T>, operation: string, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(operation, result.error);
  }
  return result.data;
}

/**
 * Validate a row id sequence given as an array or a Set.
 */
export function parseRows(operation: string, value: unknown): RowId[] {
  const candidate: unknown = value instanceof Set ? Array.from(value) : value;
  return parseWith(rowIdsSchema, operation, candidate);
}

export function parseRow(operation: string, value: unknown): RowId {
  return parseWith(rowIdSchema, operation, value);
}

export function parseBoolean(operation: string, value: unknown): boolean {
  return parseWith(z.boolean(), operation, value);
}

export function parsePattern(operation: string, value: unknown): string {
  return parseWith(patternSchema, operation, value);
}

export function parseAmount(operation: string, value: unknown): number {
  return parseWith(amountSchema, operation, value);
}
