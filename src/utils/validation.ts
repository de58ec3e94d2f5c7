/**
 * Input Validation Utility
 *
 * Consistent validation with Zod for the service layer and controllers. A
 * failed parse becomes a ValidationError, which the error handler turns into
 * a 400 response.
 *
 * Usage:
 * ```typescript
 * import { parseInput, commonSchemas } from '../utils/validation';
 *
 * const { id } = parseInput(z.object({ id: commonSchemas.id }), req.params);
 * ```
 */

import { z, type ZodError, type ZodTypeAny } from 'zod';
import { type FieldIssue, ValidationError } from './errors';

export const toFieldIssues = (error: ZodError): FieldIssue[] =>
  error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message
  }));

/**
 * Parses `data` against `schema`, throwing a ValidationError on failure.
 */
export const parseInput = <S extends ZodTypeAny>(schema: S, data: unknown, message = 'Validation failed'): z.output<S> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(message, toFieldIssues(result.error));
  }
  return result.data;
};

// Query strings arrive as text; "true"/"1" are the only truthy spellings.
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Common validation schemas for reuse across controllers
 */
export const commonSchemas = {
  id: z.coerce.number().int().positive(),

  personType: z.coerce.number().int().min(0).max(7).optional(),

  booleanFlag
};
