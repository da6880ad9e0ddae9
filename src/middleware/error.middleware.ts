import { Request, Response, NextFunction } from 'express';
import logger, { errorMessage } from '../utils/logger';

export type ErrorDetails = Record<string, string | number | undefined>;

export class HttpError extends Error {
  statusCode: number;
  details?: ErrorDetails;

  constructor(statusCode: number, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Добавляет контекст к сообщению, сохраняя статус и детали исходной ошибки.
 * Всё, что не HttpError, становится 500.
 */
export function wrapError(context: string, error: unknown): HttpError {
  const message = `${context}: ${errorMessage(error)}`;
  if (error instanceof HttpError) {
    return new HttpError(error.statusCode, message, error.details);
  }
  return new HttpError(500, message);
}

// Ошибки body-parser (например, битый JSON) несут свой статус в поле status
function statusOf(err: Error): number {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return 500;
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // express распознаёт обработчик ошибок по четырём аргументам
  next: NextFunction
) => {
  const statusCode = err instanceof HttpError ? err.statusCode : statusOf(err);
  const message = err.message || 'Internal server error';
  const details = err instanceof HttpError ? err.details : undefined;
  const isDev = process.env.NODE_ENV === 'development';

  logger.error(message, {
    statusCode,
    path: req.originalUrl,
    method: req.method,
    ...details,
    ...(isDev && { stack: err.stack }),
  });

  res.status(statusCode).json({
    status: 'error',
    statusCode,
    message,
    ...details,
    ...(isDev && { stack: err.stack }),
  });
};

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new HttpError(404, `Not Found - ${req.originalUrl}`));
};
