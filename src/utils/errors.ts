import { v4 as uuidv4 } from 'uuid';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;
  public readonly details?: unknown;
  public readonly correlationId: string;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    code?: string,
    details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.details = details;
    this.correlationId = uuidv4();

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, true, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} with id ${id} not found`
      : `${resource} not found`;
    super(message, 404, true, 'NOT_FOUND');
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, originalError?: unknown) {
    const reason = originalError === undefined ? '' : `: ${toErrorMessage(originalError)}`;
    super(
      `External service ${service} is unavailable${reason}`,
      503,
      true,
      'EXTERNAL_SERVICE_ERROR',
      { service, originalError: originalError === undefined ? undefined : toErrorMessage(originalError) }
    );
  }
}

/**
 * Raised by an adapter's startup probe when its backing service is not configured
 * or not reachable. Callers switch the collaborator off instead of retrying.
 */
export class ServiceUnavailableError extends AppError {
  constructor(service: string, reason: string) {
    super(`${service} unavailable: ${reason}`, 503, true, 'SERVICE_UNAVAILABLE', { service, reason });
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
