// Application error types
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number = 500, code: string = 'APP_ERROR') {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Render any thrown value as a single message for the user
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof ValidationError && error.details.length > 0) {
    return `${error.message}\n${error.details.map(d => `  - ${d}`).join('\n')}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
