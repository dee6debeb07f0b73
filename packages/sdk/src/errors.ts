/**
 * Error types for Todo Query operations
 *
 * Invariants:
 * - Validation errors are raised before any store access
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all Todo Query errors
 */
export abstract class TodoQueryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an identifier is not in the store's identifier format
 */
export class InvalidTodoIdError extends TodoQueryError {
  readonly code = "E_BAD_ID";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super("The requested todo id wasn't a legal identifier", options);
  }
}

/**
 * Thrown when a well-formed identifier matches no record
 */
export class TodoNotFoundError extends TodoQueryError {
  readonly code = "ENOENT";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super("The requested todo was not found", options);
  }
}

/**
 * Thrown when an enumerated request parameter has a value outside its legal set
 */
export class InvalidParameterError extends TodoQueryError {
  readonly code = "E_BAD_PARAM";

  constructor(
    public readonly parameter: string,
    public readonly allowed: readonly string[],
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a stored document cannot be read
 */
export class DocumentReadError extends TodoQueryError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when listing files in a collection directory fails
 */
export class ListFilesError extends TodoQueryError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a stored document is not a valid todo record
 */
export class InvalidDocumentError extends TodoQueryError {
  readonly code = "E_BAD_DOC";

  constructor(
    public readonly path: string,
    public readonly reasons: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Invalid todo document ${path}: ${reasons.join("; ")}`, options);
  }
}
