// Error kinds raised by the knowledge graph and its storage

export type MemoryErrorKind =
  | "NotFound"
  | "Duplicate"
  | "Validation"
  | "Storage"
  | "Format";

/**
 * Base class for every error the memory server surfaces to callers.
 * `operation` names the call that failed and `key` the offending entity,
 * relation or file location, when there is one.
 */
export class MemoryError extends Error {
  public readonly kind: MemoryErrorKind;
  public readonly operation: string;
  public readonly key?: string;

  constructor(
    kind: MemoryErrorKind,
    operation: string,
    message: string,
    key?: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation}: ${message}`, options);
    this.name = "MemoryError";
    this.kind = kind;
    this.operation = operation;
    this.key = key;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A referenced entity does not exist */
export class NotFoundError extends MemoryError {
  constructor(operation: string, entityName: string) {
    super("NotFound", operation, `entity "${entityName}" not found`, entityName);
    this.name = "NotFoundError";
  }
}

/** An entity name is already taken on a strict create */
export class DuplicateError extends MemoryError {
  constructor(operation: string, entityName: string) {
    super("Duplicate", operation, `entity "${entityName}" already exists`, entityName);
    this.name = "DuplicateError";
  }
}

/** Caller supplied a record that breaks a data-model invariant */
export class ValidationError extends MemoryError {
  constructor(operation: string, message: string, key?: string) {
    super("Validation", operation, message, key);
    this.name = "ValidationError";
  }
}

/** Reading or writing the backing file failed */
export class StorageError extends MemoryError {
  constructor(operation: string, filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("Storage", operation, `I/O failure on ${filePath}: ${reason}`, filePath, { cause });
    this.name = "StorageError";
  }
}

/** A persisted record could not be decoded or encoded */
export class FormatError extends MemoryError {
  constructor(operation: string, location: string, message: string, cause?: unknown) {
    super("Format", operation, `${location}: ${message}`, location, { cause });
    this.name = "FormatError";
  }
}
