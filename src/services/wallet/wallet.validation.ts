import { body } from 'express-validator';

import { amountField, currencyField, idParam, paginationQuery } from '../../utils/validators';

export const createWalletValidation = [
  body('customerId')
    .notEmpty()
    .withMessage('Customer ID is required')
    .isString()
    .withMessage('Customer ID must be a string')
    .isLength({ max: 128 })
    .withMessage('Customer ID cannot exceed 128 characters'),
  currencyField(),
];

export const customerParamValidation = [idParam('customerId', 'Customer ID')];

export const creditValidation = [
  ...customerParamValidation,
  amountField('amount'),
  body('description')
    .optional()
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: 255 })
    .withMessage('Description cannot exceed 255 characters'),
];

export const ledgerQueryValidation = (maxLimit: number) => [
  ...customerParamValidation,
  ...paginationQuery(maxLimit),
];

export const listWalletsValidation = (maxLimit: number) => paginationQuery(maxLimit);
