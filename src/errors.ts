/**
 * Error classes raised by the pool, the factory and the fetcher
 */

export class RenderPoolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderPoolError";
  }
}

/**
 * No browser kind was configured
 */
export class NotConfiguredError extends RenderPoolError {
  constructor(message: string) {
    super(message);
    this.name = "NotConfiguredError";
  }
}

export class ConfigurationError extends RenderPoolError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A session could not be created
 */
export class ProvisioningError extends RenderPoolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvisioningError";
  }
}

export class UnsupportedBrowserError extends ProvisioningError {
  readonly browserKind: string;

  constructor(browserKind: string) {
    super(`Unsupported browser kind: ${browserKind}`);
    this.name = "UnsupportedBrowserError";
    this.browserKind = browserKind;
  }
}

/**
 * acquire() timed out. Callers skip rendering for the request.
 */
export class PoolExhaustedError extends RenderPoolError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No browser session available within ${timeoutMs}ms`);
    this.name = "PoolExhaustedError";
    this.timeoutMs = timeoutMs;
  }
}

export class PoolClosedError extends RenderPoolError {
  constructor() {
    super("Session pool is shut down");
    this.name = "PoolClosedError";
  }
}

/**
 * A replacement session could not be created; the pool is below its size
 */
export class PoolDegradedError extends RenderPoolError {
  readonly total: number;
  readonly maxSize: number;

  constructor(total: number, maxSize: number, cause: unknown) {
    super(`Session pool degraded to ${total}/${maxSize} sessions`, { cause });
    this.name = "PoolDegradedError";
    this.total = total;
    this.maxSize = maxSize;
  }
}

export class SessionNotCheckedOutError extends RenderPoolError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is not checked out`);
    this.name = "SessionNotCheckedOutError";
  }
}

export class RenderFailedError extends RenderPoolError {
  readonly url: string;
  /** Set when the failed session could not be replaced */
  readonly replacementError?: PoolDegradedError;

  constructor(url: string, cause: unknown, replacementError?: PoolDegradedError) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Rendering ${url} failed: ${reason}`, { cause });
    this.name = "RenderFailedError";
    this.url = url;
    this.replacementError = replacementError;
  }
}
