/**
 * Error taxonomy shared by the task entity and the storage engine.
 * Every error carries the underlying failure as the standard `cause`.
 */

export class TaskliteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected user input, e.g. an empty task description */
export class ValidationError extends TaskliteError {}

/** Base class for failures while reading or writing the task file */
export class StorageError extends TaskliteError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

/** The task file exists but is not valid JSON */
export class CorruptDataError extends StorageError {}

/** The task file parsed but is not a `{ tasks: [...] }` document */
export class SchemaError extends StorageError {}

/** Filesystem failure: permissions, missing directories, full disk, failed rename */
export class StorageIOError extends StorageError {}

/** Node's system errors carry a string `code` such as ENOENT */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
