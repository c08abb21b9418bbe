import { body, ValidationChain } from 'express-validator';

// "a@b.com" and ["a@b.com"] are the same request
const asList = (value: unknown): unknown => (typeof value === 'string' ? [value] : value);

function addressList(field: string, required: boolean): ValidationChain[] {
  const list = required ? body(field) : body(field).optional();
  return [
    list
      .customSanitizer(asList)
      .isArray({ min: required ? 1 : 0 })
      .withMessage(`${field} must be an email or a list of emails`),
    body(`${field}.*`)
      .isString()
      .withMessage(`Each ${field} entry must be a string`)
      .bail()
      .trim()
      .isEmail()
      .withMessage(`Each ${field} entry must be a valid email`),
  ];
}

export function sendValidators(maxRepeat: number): ValidationChain[] {
  return [
    ...addressList('recipients', true),
    body('subject').isString().withMessage('subject is required'),
    body('body').isString().withMessage('body is required'),
    body('is_html').optional().isBoolean({ strict: true }).withMessage('is_html must be a boolean').toBoolean(true),
    ...addressList('cc', false),
    ...addressList('bcc', false),
    body('reply_to').optional().isString().trim().isEmail().withMessage('reply_to must be a valid email'),
    body('repeat')
      .optional()
      .isInt({ min: 1, max: maxRepeat })
      .withMessage(`repeat must be an integer from 1 to ${maxRepeat}`)
      .toInt(),
  ];
}

/** Body shape of the original `/mail` endpoint, where the token travels in the body. */
export function legacyMailValidators(maxRepeat: number): ValidationChain[] {
  return [
    body('recipient_email')
      .isString()
      .withMessage('recipient_email is required')
      .bail()
      .trim()
      .isEmail()
      .withMessage('recipient_email must be a valid email'),
    body('subject').isString().withMessage('subject is required'),
    body('body').isString().withMessage('body is required'),
    body('quantity')
      .optional()
      .isInt({ min: 1, max: maxRepeat })
      .withMessage(`quantity must be an integer from 1 to ${maxRepeat}`)
      .toInt(),
    body('token')
      .isString()
      .withMessage('token is required')
      .bail()
      .trim()
      .notEmpty()
      .withMessage('token is required'),
  ];
}
