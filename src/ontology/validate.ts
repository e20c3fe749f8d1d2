import type { z } from 'zod';
import {
  VALIDATION_ERROR_KINDS,
  ValidationError,
  type ValidationErrorKind,
  type ValidationIssue,
} from '../shared/errors.js';

/**
 * Render a zod issue path as `steps[0].messages[1].role`.
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

/**
 * Look up the raw value an issue path points at. Missing branches yield undefined.
 */
export function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function isValidationErrorKind(value: unknown): value is ValidationErrorKind {
  return typeof value === 'string' && VALIDATION_ERROR_KINDS.some((kind) => kind === value);
}

export function classifyIssue(issue: z.ZodIssue): ValidationErrorKind {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'missing_field' : 'type_mismatch';
    case 'invalid_enum_value':
    case 'invalid_literal':
      return 'invalid_enum';
    case 'custom': {
      const kind: unknown = issue.params?.kind;
      return isValidationErrorKind(kind) ? kind : 'invariant_violation';
    }
    case 'too_small':
    case 'too_big':
    case 'not_finite':
      return 'invariant_violation';
    default:
      return 'type_mismatch';
  }
}

export function toValidationError(entity: string, input: unknown, error: z.ZodError): ValidationError {
  const issues: ValidationIssue[] = error.issues.map((issue) => ({
    kind: classifyIssue(issue),
    path: formatPath(issue.path),
    message: issue.message,
    value: valueAtPath(input, issue.path),
  }));
  return new ValidationError(entity, issues);
}

/**
 * Parse `input` with `schema`, raising a ValidationError instead of a ZodError.
 */
export function parseEntity<T>(
  entity: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(entity, input, result.error);
  }
  return result.data;
}
