/**
 * Error taxonomy for the metadata engine.
 *
 * Every error carries a stable `code` so callers can branch without string
 * matching, plus an optional `context` record describing where it happened.
 * Each class exposes a static guard that also accepts errors that crossed a
 * realm boundary (matched by `name`).
 */

export type TErrorCode =
  | 'CONFIGURATION'
  | 'UNKNOWN_TYPE'
  | 'DOCUMENT_PARSE'
  | 'CONSTRAINT_VIOLATION'
  | 'NOT_FOUND';

export type TErrorContext = Record<string, string | number | boolean | undefined>;

export class MetaDataError extends Error {
  constructor(
    message: string,
    public readonly code: TErrorCode,
    public readonly context: TErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MetaDataError';
  }

  static isMetaDataError(error: unknown): error is MetaDataError {
    return error instanceof MetaDataError;
  }
}

/**
 * Structural problem with the metadata model or its inputs: unresolved super
 * references, malformed documents, conflicting registrations, overlays that
 * target nothing.
 */
export class ConfigurationError extends MetaDataError {
  constructor(
    message: string,
    context: TErrorContext = {},
    options?: { cause?: unknown; code?: TErrorCode }
  ) {
    super(message, options?.code ?? 'CONFIGURATION', context, options);
    this.name = 'ConfigurationError';
  }

  static isConfigurationError(error: unknown): error is ConfigurationError {
    return (
      error instanceof ConfigurationError ||
      (error instanceof Error && error.name === 'ConfigurationError')
    );
  }
}

/**
 * Raised when a (type, subType) pair was never registered.
 */
export class UnknownTypeError extends ConfigurationError {
  constructor(
    public readonly type: string,
    public readonly subType: string | undefined,
    public readonly suggestions: string[] = []
  ) {
    const pair = subType ? `${type}.${subType}` : type;
    const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(', ')}?` : '';
    super(`Unknown metadata type '${pair}'.${hint}`, { type, subType }, { code: 'UNKNOWN_TYPE' });
    this.name = 'UnknownTypeError';
  }

  static isUnknownTypeError(error: unknown): error is UnknownTypeError {
    return (
      error instanceof UnknownTypeError ||
      (error instanceof Error && error.name === 'UnknownTypeError')
    );
  }
}

/**
 * Syntax or envelope errors in an XML/JSON document.
 */
export class DocumentParseError extends ConfigurationError {
  constructor(
    message: string,
    public readonly sourceName: string,
    public readonly line?: number,
    options?: { cause?: unknown }
  ) {
    const where = line !== undefined ? `${sourceName}:${line}` : sourceName;
    super(`${where}: ${message}`, { sourceName, line }, { ...options, code: 'DOCUMENT_PARSE' });
    this.name = 'DocumentParseError';
  }

  static isDocumentParseError(error: unknown): error is DocumentParseError {
    return (
      error instanceof DocumentParseError ||
      (error instanceof Error && error.name === 'DocumentParseError')
    );
  }
}

/**
 * A structural mutation was rejected by the constraint engine.
 *
 * `value` holds the offending value: the attribute value for
 * attribute-scoped constraints, otherwise the child's name.
 */
export class ConstraintViolationError extends MetaDataError {
  constructor(
    message: string,
    public readonly constraintId: string,
    public readonly value: unknown,
    public readonly nodePath: string
  ) {
    super(message, 'CONSTRAINT_VIOLATION', { constraintId, nodePath });
    this.name = 'ConstraintViolationError';
  }

  static isConstraintViolation(error: unknown): error is ConstraintViolationError {
    return (
      error instanceof ConstraintViolationError ||
      (error instanceof Error && error.name === 'ConstraintViolationError')
    );
  }
}

/**
 * Lookup miss. Used internally by existence checks; `hasX` helpers convert it
 * into a boolean.
 */
export class NotFoundError extends MetaDataError {
  constructor(
    public readonly kind: string,
    public readonly lookupName: string,
    where?: string
  ) {
    super(
      `${kind} '${lookupName}' not found${where ? ` in ${where}` : ''}`,
      'NOT_FOUND',
      { kind, lookupName, where }
    );
    this.name = 'NotFoundError';
  }

  static isNotFoundError(error: unknown): error is NotFoundError {
    return (
      error instanceof NotFoundError ||
      (error instanceof Error && error.name === 'NotFoundError')
    );
  }
}

/**
 * Render an error as a single diagnostic line.
 */
export function formatError(error: unknown): string {
  if (error instanceof MetaDataError) {
    const source = error.context.sourceName;
    const path = error.context.nodePath ?? error.context.path;
    const suffix = [source ? `source=${source}` : '', path ? `at=${path}` : '']
      .filter(Boolean)
      .join(' ');
    return `[${error.code}] ${error.message}${suffix ? ` (${suffix})` : ''}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
