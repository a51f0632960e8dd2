/** Invalid or missing configuration. Fatal: surfaced immediately, never recovered. */
export class ConfigurationError extends Error {
  constructor(message: string, readonly option?: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A non rule-based strategy could not produce a usable ranking. */
export class SelectionFailure extends Error {
  constructor(readonly strategy: string, message: string, options?: { cause?: unknown }) {
    super(`${strategy}: ${message}`, options);
    this.name = "SelectionFailure";
  }
}

/** Any failure talking to a remote service. Not retried. */
export class RemoteError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RemoteError";
  }
}

/** Rate limiting. The only remote error the call wrapper retries. */
export class RemoteTransientError extends RemoteError {
  constructor(message: string, status?: number, readonly retryAfterMs?: number) {
    super(message, status);
    this.name = "RemoteTransientError";
  }
}

/** Auth or structural failure (bad key, bad request, unparseable response). */
export class RemoteFatalError extends RemoteError {
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = "RemoteFatalError";
  }
}
