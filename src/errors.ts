export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage ${operation} failed: ${detail}`, { cause });
    this.name = "PersistenceError";
    this.operation = operation;
  }
}
