import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';
import { BaseController } from '../controllers/base.controller';
import { ValidationErrors } from '../types';

const baseController = new BaseController();

export const validate = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (errors.isEmpty()) {
    return next();
  }

  const extractedErrors: ValidationErrors = {};
  errors.array().forEach((err) => {
    if (err.type === 'field' && !(err.path in extractedErrors)) {
      extractedErrors[err.path] = String(err.msg);
    }
  });

  return baseController.handleValidationError(res, extractedErrors);
};
