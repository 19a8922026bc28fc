/**
 * Raised when a logical request cannot be turned into a wire request
 * (bad method token, unparsable or rejected URL, body that cannot be
 * encoded). Never retried.
 */
export class MaterializationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MaterializationError";
  }
}

/**
 * Network-level failure reported by a transport: connect errors, timeouts,
 * broken sockets. HTTP error statuses are responses, not transport errors.
 */
export class TransportError extends Error {
  /** Number of calls made before giving up (1 + retries performed). */
  public attempts: number;

  constructor(message: string, options?: ErrorOptions & { attempts?: number }) {
    super(message, options);
    this.name = "TransportError";
    this.attempts = options?.attempts ?? 1;
  }
}

/**
 * A hook threw. The request's result is replaced by this failure; the
 * thrown value is the `cause`.
 */
export class HookError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HookError";
  }
}

export class DecodingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodingError";
  }
}

/**
 * Builder misuse (odd key/value pairs, unknown path keys, invalid config).
 * Thrown synchronously at the call site since it signals a caller bug.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type RequestError = MaterializationError | TransportError | HookError;
