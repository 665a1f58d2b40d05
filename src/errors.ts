/**
 * src/errors.ts
 *
 * Jerarquía de errores de la aplicación.
 * Hono los traduce a respuestas HTTP en `app.onError`.
 */

/** Códigos HTTP que puede llevar un AppError */
export type ErrorStatusCode = 400 | 401 | 403 | 404 | 409 | 429 | 500 | 502 | 503 | 504;

export type ErrorOptions = {
  code?: string | undefined;
  cause?: unknown;
  context?: Record<string, unknown> | undefined;
};

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: ErrorStatusCode;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    options: ErrorOptions & { statusCode?: ErrorStatusCode | undefined } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.statusCode = options.statusCode ?? 500;
    this.context = options.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', options: ErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'NOT_FOUND', statusCode: 404 });
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', options: ErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'VALIDATION_ERROR', statusCode: 400 });
  }
}

export class ExternalServiceError extends AppError {
  constructor(message = 'External service failure', options: ErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? 'EXTERNAL_SERVICE_ERROR', statusCode: 502 });
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout después de ${timeoutMs}ms en '${operation}'`, {
      code: 'TIMEOUT',
      statusCode: 504,
      context: { operation, timeoutMs },
    });
  }
}

/**
 * Mensaje legible de cualquier valor lanzado
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
