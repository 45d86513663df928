/**
 * Error taxonomy for the database layer.
 *
 * Every failure surfaced by {@link Database} or {@link query} is a `DbError`
 * subclass. The engine's own error, when there is one, is kept as `cause`.
 */

export class DbError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The store could not be opened or created, or the handle is closed. */
export class ConnectionError extends DbError {}

/** A parameterless statement passed to `exec` did not complete. */
export class ExecutionError extends DbError {}

/** The statement text could not be compiled. */
export class PrepareError extends DbError {}

/** An argument could not be attached to its parameter slot. */
export class BindError extends DbError {
  constructor(
    message: string,
    readonly position: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Execution of a prepared statement did not finish cleanly. */
export class StepError extends DbError {}

/** A column's storage class cannot satisfy the requested field type. */
export class DecodeTypeError extends DbError {
  constructor(
    message: string,
    readonly column: string,
    readonly index: number,
  ) {
    super(message);
  }
}

/** Extract a printable message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
