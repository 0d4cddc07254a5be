import { body, param, query, ValidationChain } from 'express-validator';

/**
 * Positive amount with at most two decimal places
 */
export const amountField = (field: string, optional = false): ValidationChain => {
  const chain = body(field);
  return (optional ? chain.optional() : chain.notEmpty().withMessage(`${field} is required`))
    .isFloat({ gt: 0 })
    .withMessage(`${field} must be a positive number greater than 0`)
    .custom((value: unknown) => {
      if (/e/i.test(String(value))) {
        throw new Error(`${field} must be a plain decimal number`);
      }
      const decimalPlaces = (String(value).split('.')[1] || '').length;
      if (decimalPlaces > 2) {
        throw new Error(`${field} can have at most 2 decimal places`);
      }
      return true;
    })
    .toFloat();
};

export const currencyField = (field = 'currency'): ValidationChain =>
  body(field)
    .optional()
    .isString()
    .withMessage('Currency must be a string')
    .isLength({ min: 3, max: 3 })
    .withMessage('Currency must be a 3-letter code')
    .toUpperCase();

export const idParam = (name: string, label: string): ValidationChain =>
  param(name)
    .notEmpty()
    .withMessage(`${label} is required`)
    .isString()
    .withMessage(`${label} must be a string`);

export const paginationQuery = (maxLimit: number): ValidationChain[] => [
  query('limit')
    .optional()
    .isInt({ min: 1, max: maxLimit })
    .withMessage(`Limit must be between 1 and ${maxLimit}`),
  query('offset').optional().isInt({ min: 0 }).withMessage('Offset must be a non-negative integer'),
];
