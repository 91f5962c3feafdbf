export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DATABASE_ERROR'
  | 'AI_SERVICE_ERROR'
  | 'PREDICTION_ERROR'
  | 'NOT_FOUND'
  | 'SERVER_ERROR';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 500,
  DATABASE_ERROR: 500,
  AI_SERVICE_ERROR: 500,
  PREDICTION_ERROR: 500,
  NOT_FOUND: 404,
  SERVER_ERROR: 500,
};

/**
 * Error raised by services. Callers only ever see `{"status":"failed"}`;
 * the code is for the log.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}
