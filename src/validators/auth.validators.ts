import { body, ValidationChain } from 'express-validator';

export const authValidators: ValidationChain[] = [
  body('email')
    .isString()
    .withMessage('Provide an email')
    .trim()
    .notEmpty()
    .withMessage('Provide an email')
    .isEmail()
    .withMessage('Invalid email'),
  body('password')
    .isString()
    .withMessage('Provide the app password')
    .notEmpty()
    .withMessage('Provide the app password'),
];
