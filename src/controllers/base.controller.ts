import { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from '../utils/logger';
import { ValidationErrors } from '../types';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export class BaseController {
  /**
   * Успешный ответ. Тело отдаётся как есть, без обёртки { success, data }:
   * клиенты сервиса ждут голый объект анализа/ответа.
   */
  protected handleSuccess<T>(res: Response, data: T, statusCode: number = 200) {
    logger.debug(`Success: ${statusCode}`);
    return res.status(statusCode).json(data);
  }

  /**
   * Ошибки валидации входных данных
   */
  public handleValidationError(res: Response, errors: ValidationErrors) {
    logger.warn('Validation failed', { errors });
    return res.status(400).json({
      success: false,
      error: 'Validation failed',
      errors,
    });
  }

  /**
   * Обработчик асинхронных методов контроллера: отказ промиса уходит в next()
   */
  protected asyncHandler(fn: AsyncRoute): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      Promise.resolve(fn(req, res, next)).catch(next);
    };
  }
}
