export type AppErrorCode =
  | 'INVALID_INPUT'
  | 'EMPTY_UPSTREAM_RESPONSE'
  | 'SCHEMA_VIOLATION'
  | 'UPSTREAM_TRANSPORT_FAILURE';

// Carries a machine-readable code so routers can map failures to HTTP responses
export class AppError extends Error {
  constructor(
    public readonly code: AppErrorCode,
    message?: string,
    public readonly details: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message ?? code, options);
    this.name = 'AppError';
  }
}

export const isAppError = (error: unknown, code?: AppErrorCode): error is AppError =>
  error instanceof AppError && (code === undefined || error.code === code);
