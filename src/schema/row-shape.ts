import type { z } from 'zod';
import { SchemaValidationError, type SchemaIssue } from '../errors.js';

/**
 * The shape a result row is reconstructed into. A zod object schema's
 * `shape` is the ordered list of (field name, decoder) pairs projection
 * and validation are driven by.
 */
export type RowShape = z.ZodObject<z.ZodRawShape>;

/** Field names of a row-shape, in declaration order. */
export function fieldNames(shape: RowShape): readonly string[] {
  return Object.keys(shape.shape);
}

function toIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates one row mapping against the row-shape.
 * @throws SchemaValidationError listing every failing field
 */
export function parseRow<S extends RowShape>(
  shape: S,
  mapping: Record<string, unknown>,
  rowIndex?: number,
): z.infer<S> {
  const parsed = shape.safeParse(mapping);
  if (parsed.success) {
    return parsed.data;
  }
  const issues = toIssues(parsed.error);
  const where = rowIndex === undefined ? 'Row' : `Row ${rowIndex}`;
  throw new SchemaValidationError(
    `${where} does not match the row shape: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
    issues,
    rowIndex,
    parsed.error,
  );
}
