export type AgoraErrorCode = "INVALID_ARGUMENT" | "PERSISTENCE_FAILURE" | "QUEUE_OVERFLOW";

export class AgoraError extends Error {
  readonly code: AgoraErrorCode;

  constructor(code: AgoraErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A setup-time contract violation: duplicate registrations, duplicate
 * relationships, unknown agent types. Raised at the offending call site and
 * never swallowed.
 */
export class ConfigurationError extends AgoraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_ARGUMENT", message, options);
  }
}

/** Raised inside persistence adapters; their public methods turn it into `false` or `[]`. */
export class PersistenceError extends AgoraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_FAILURE", message, options);
  }
}

export class QueueOverflowError extends AgoraError {
  readonly capacity: number;

  constructor(capacity: number) {
    super("QUEUE_OVERFLOW", `Event queue is full (capacity ${capacity})`);
    this.capacity = capacity;
  }
}
