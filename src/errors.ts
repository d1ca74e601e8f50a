/**
 * SDK Error Types
 *
 * Every error raised by the SDK extends OpenWebUIError, so callers can catch
 * all of them with a single `instanceof` check.
 */

export class OpenWebUIError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OpenWebUIError';
  }
}

/**
 * The server answered with a 4xx/5xx status.
 */
export class APIError extends OpenWebUIError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(`API Error ${statusCode}: ${message}`);
    this.name = 'APIError';
  }
}

export class AuthenticationError extends APIError {
  constructor(message = 'Invalid or missing API key.') {
    super(message, 401);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends APIError {
  constructor(public readonly resource: string) {
    super(`The requested resource '${resource}' was not found.`, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * A 2xx body that does not have the shape the SDK reads.
 */
export class ResponseFormatError extends OpenWebUIError {
  constructor(
    public readonly resource: string,
    detail: string
  ) {
    super(`Unexpected response from server for ${resource}: ${detail}`);
    this.name = 'ResponseFormatError';
  }
}

/**
 * The request never got an HTTP answer (refused, reset, DNS, timeout).
 */
export class ConnectionError extends OpenWebUIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class ConfigurationError extends OpenWebUIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class FileNotFoundError extends OpenWebUIError {
  constructor(public readonly path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class NotADirectoryError extends OpenWebUIError {
  constructor(public readonly path: string) {
    super(`Directory not found: ${path}`);
    this.name = 'NotADirectoryError';
  }
}

/**
 * Renders any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
