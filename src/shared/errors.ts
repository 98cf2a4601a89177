// Common error classes and error-to-log mapping utilities

export type LomographyErrorOptions = { code?: string; statusCode?: number; details?: unknown; cause?: unknown };

export class LomographyError extends Error {
  code: string;
  statusCode?: number;
  details?: unknown;
  constructor(message: string, options?: LomographyErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LomographyError';
    this.code = options?.code ?? 'LOMOGRAPHY_ERROR';
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }
}

export class ConfigurationError extends LomographyError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'CONFIG_INVALID', details });
    this.name = 'ConfigurationError';
  }
}

// Caller passed arguments the API cannot accept (window, id, coordinates)
export class ValidationError extends LomographyError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'VALIDATION_ERROR', details });
    this.name = 'ValidationError';
  }
}

export class HttpError extends LomographyError {
  readonly url: string;
  constructor(status: number, url: string, statusText = '') {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`, { code: 'HTTP_ERROR', statusCode: status });
    this.name = 'HttpError';
    this.url = url;
  }
}

export class NotFoundError extends HttpError {
  constructor(url: string, statusText = 'Not Found') {
    super(404, url, statusText);
    this.name = 'NotFoundError';
    this.code = 'NOT_FOUND';
  }
}

export class AuthenticationError extends HttpError {
  constructor(status: number, url: string, statusText = '') {
    super(status, url, statusText);
    this.name = 'AuthenticationError';
    this.code = 'UNAUTHORIZED';
  }
}

export class NetworkError extends LomographyError {
  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, { code: 'NETWORK_ERROR', cause });
    this.name = 'NetworkError';
  }
}

export class RequestTimeoutError extends LomographyError {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, { code: 'TIMEOUT' });
    this.name = 'RequestTimeoutError';
  }
}

export class ClientClosedError extends LomographyError {
  constructor() {
    super('Client has been closed', { code: 'CLIENT_CLOSED' });
    this.name = 'ClientClosedError';
  }
}

// Upstream answered 2xx with a body that does not match the endpoint schema
export class ResponseValidationError extends LomographyError {
  constructor(url: string, issues: unknown) {
    super(`Unexpected response shape from ${url}`, { code: 'INVALID_RESPONSE', details: issues });
    this.name = 'ResponseValidationError';
  }
}

export function httpErrorFor(status: number, url: string, statusText = ''): HttpError {
  if (status === 404) return new NotFoundError(url, statusText || undefined);
  if (status === 401 || status === 403) return new AuthenticationError(status, url, statusText);
  return new HttpError(status, url, statusText);
}

export type ErrorInfo = { code: string; message: string; statusCode?: number };

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof LomographyError) {
    return { code: err.code, message: err.message, statusCode: err.statusCode };
  }
  if (err instanceof Error) return { code: 'UNKNOWN', message: err.message };
  return { code: 'UNKNOWN', message: String(err) };
}
