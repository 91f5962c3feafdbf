import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface FailureResponse {
  status: 'failed';
}

const MONGO_ERROR_NAMES = new Set([
  'MongooseError',
  'MongoError',
  'MongoServerError',
  'MongoNetworkError',
  'MongoServerSelectionError',
  'MongooseServerSelectionError',
  'MongoNotConnectedError',
  'CastError',
  'ValidationError',
  'DocumentNotFoundError',
]);

const hasStringProp = <K extends string>(value: unknown, key: K): value is Record<K, string> =>
  typeof value === 'object' && value !== null && key in value && typeof Reflect.get(value, key) === 'string';

/**
 * Maps anything thrown below the controllers to an error code. body-parser
 * tags malformed JSON with `type: 'entity.parse.failed'`.
 */
export const classifyError = (err: unknown): { code: ErrorCode; statusCode: number } => {
  if (err instanceof AppError) {
    return { code: err.code, statusCode: err.statusCode };
  }

  if (hasStringProp(err, 'type') && err.type.startsWith('entity.')) {
    return { code: 'VALIDATION_ERROR', statusCode: 500 };
  }

  if (hasStringProp(err, 'name') && MONGO_ERROR_NAMES.has(err.name)) {
    return { code: 'DATABASE_ERROR', statusCode: 500 };
  }

  return { code: 'SERVER_ERROR', statusCode: 500 };
};

export const errorHandler = (err: unknown, req: Request, res: Response<FailureResponse>, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { code, statusCode } = classifyError(err);
  if (statusCode >= 500) {
    logger.error(`Error in ${req.method} ${req.path} [${code}]:`, err);
  } else {
    logger.warn(`${req.method} ${req.path} [${code}]: ${err instanceof Error ? err.message : String(err)}`);
  }

  res.status(statusCode).json({ status: 'failed' });
};

export const notFoundHandler = (req: Request, res: Response<FailureResponse>): void => {
  res.status(404).json({ status: 'failed' });
};
