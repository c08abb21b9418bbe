import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { sendValidationErrors } from '../common/response';

/** Runs chains in order, so a sanitizer on a field is applied before its wildcard checks. */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    for (const v of validations) {
      await v.run(req);
    }
    const errors = validationResult(req).array();
    if (errors.length > 0) {
      sendValidationErrors(res, errors);
      return;
    }
    next();
  };
}
