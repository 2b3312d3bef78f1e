export type ErrorDetails = Record<string, unknown> | null;

export class ServiceError extends Error {
  readonly status: number;

  readonly code: string;

  readonly details: ErrorDetails;

  readonly retryAfterSeconds: number | null;

  constructor(
    status: number,
    code: string,
    message: string,
    details: ErrorDetails = null,
    retryAfterSeconds: number | null = null,
  ) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
    this.code = code;
    this.details = details;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export function badRequest(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(400, code, message, details ?? null);
}

export function unauthorized(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(401, code, message, details ?? null);
}

export function forbidden(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(403, code, message, details ?? null);
}

export function notFound(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(404, code, message, details ?? null);
}

export function conflict(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(409, code, message, details ?? null);
}

export function gone(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(410, code, message, details ?? null);
}

export function locked(code: string, message: string, retryAfterSeconds: number) {
  return new ServiceError(423, code, message, { retryAfterSeconds }, retryAfterSeconds);
}

export function tooManyRequests(code: string, message: string, retryAfterSeconds: number) {
  return new ServiceError(429, code, message, { retryAfterSeconds }, retryAfterSeconds);
}

export function serviceUnavailable(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(503, code, message, details ?? null);
}
