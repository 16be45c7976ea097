import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';
import { ValidationError, formatValidationErrors } from './errorHandler';

// Runs after a route's express-validator chain
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    next(new ValidationError('Validation failed', formatValidationErrors(errors.array())));
    return;
  }
  next();
};
