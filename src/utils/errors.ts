/**
 * Error types and codes for docmeta.
 * All errors raised by the library extend DocmetaError.
 */
import type { AnnotationTarget } from '../core/annotation/types.js';

/**
 * Base error class for all docmeta errors.
 */
export class DocmetaError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocmetaError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Where a directive was found. Supplied by the reflection layer.
 */
export interface SourcePosition {
  filePath?: string;
  line?: number;
}

/**
 * Argument text that does not reduce to a literal list.
 */
export class ParseError extends DocmetaError {
  readonly filePath?: string;
  readonly line?: number;

  constructor(message: string, details: Record<string, unknown> = {}, position: SourcePosition = {}) {
    super(ErrorCodes.PARSE_ERROR, message, { ...details, ...position });
    this.name = 'ParseError';
    this.filePath = position.filePath;
    this.line = position.line;
  }
}

/**
 * A directive whose name has no registered annotation kind.
 */
export class UnknownAnnotationError extends DocmetaError {
  readonly filePath?: string;
  readonly line?: number;

  constructor(public readonly annotationName: string, position: SourcePosition = {}) {
    super(
      ErrorCodes.UNKNOWN_ANNOTATION,
      `Unknown annotation: "${annotationName}". It must be registered before use: registry.register(${annotationName}Annotation)`,
      { annotationName, ...position }
    );
    this.name = 'UnknownAnnotationError';
    this.filePath = position.filePath;
    this.line = position.line;
  }
}

/**
 * Batched report of every rule an annotation instance violated.
 */
export class AnnotationValidationError extends DocmetaError {
  readonly filePath: string;
  readonly line: number;

  constructor(
    public readonly annotationName: string,
    message: string,
    public readonly errors: readonly string[],
    public readonly target: AnnotationTarget,
    /** The kind does not apply to this element at all */
    public readonly typeError: boolean
  ) {
    super(
      typeError ? ErrorCodes.INAPPLICABLE_ANNOTATION : ErrorCodes.INVALID_ANNOTATION,
      message,
      { annotationName, errors, filePath: target.filePath, line: target.lineNumber }
    );
    this.name = 'AnnotationValidationError';
    this.filePath = target.filePath;
    this.line = target.lineNumber;
  }
}

/**
 * Registry misuse (zero target mask, registration after sealing).
 */
export class RegistryError extends DocmetaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends DocmetaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, unreadable YAML, etc.).
 */
export class SystemError extends DocmetaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Directive errors (A001-A005)
  PARSE_ERROR: 'A001',
  UNKNOWN_ANNOTATION: 'A002',
  INVALID_ANNOTATION: 'A003',
  INAPPLICABLE_ANNOTATION: 'A004',
  ANNOTATION_REUSED: 'A005',

  // Registry errors
  REGISTRY_SEALED: 'R001',
  EMPTY_TARGET_MASK: 'R002',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // System errors
  YAML_PARSE_ERROR: 'S001',
  FILE_READ_ERROR: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Narrow an unknown thrown value to a docmeta error.
 */
export function isDocmetaError(error: unknown): error is DocmetaError {
  return error instanceof DocmetaError;
}
