/**
 * A storage operation failed. `operation` names the persistence call, the
 * driver error is kept as `cause`.
 */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${reason}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}
