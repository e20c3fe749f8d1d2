/**
 * Error types raised by the ontology model, the trace normalizers and config loading.
 */

export class OntologyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OntologyError';
  }
}

export type ValidationErrorKind =
  | 'missing_field'
  | 'type_mismatch'
  | 'invalid_enum'
  | 'invariant_violation';

export const VALIDATION_ERROR_KINDS: readonly ValidationErrorKind[] = [
  'missing_field',
  'type_mismatch',
  'invalid_enum',
  'invariant_violation',
];

export interface ValidationIssue {
  kind: ValidationErrorKind;
  /** Field path such as `steps[0].messages[1].role` (empty for the root) */
  path: string;
  message: string;
  /** The offending raw value */
  value: unknown;
}

/**
 * Raised when an entity cannot be constructed from its input.
 * `kind`, `path` and `value` describe the first issue; `issues` lists all of them.
 */
export class ValidationError extends OntologyError {
  readonly kind: ValidationErrorKind;
  readonly path: string;
  readonly value: unknown;

  constructor(
    readonly entity: string,
    readonly issues: ValidationIssue[],
  ) {
    const first = issues[0] ?? {
      kind: 'type_mismatch' as const,
      path: '',
      message: 'Invalid input',
      value: undefined,
    };
    const location = first.path ? ` at ${first.path}` : '';
    super(`Invalid ${entity}${location}: ${first.message}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.kind = first.kind;
    this.path = first.path;
    this.value = first.value;
  }
}

export type NormalizationErrorKind =
  | 'unrecognized_shape'
  | 'invalid_timestamp'
  | 'dangling_reference'
  | 'cyclic_reference'
  | 'duplicate_id'
  | 'invalid_entity';

/**
 * Raised when a raw trace document cannot be turned into a Run.
 * Normalization never returns a partial Run.
 */
export class NormalizationError extends OntologyError {
  constructor(
    readonly kind: NormalizationErrorKind,
    message: string,
    readonly path: string,
    readonly value?: unknown,
    options?: { cause?: unknown },
  ) {
    super(path ? `${message} (at ${path})` : message, 'NORMALIZATION_ERROR', options);
    this.name = 'NormalizationError';
  }
}

export class ConfigError extends OntologyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
