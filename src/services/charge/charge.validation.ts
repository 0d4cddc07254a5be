import { body, query } from 'express-validator';

import { ChargeStatus } from '../../types/events';
import { amountField, currencyField, idParam, paginationQuery } from '../../utils/validators';

export const createChargeValidation = [
  body('customerId')
    .notEmpty()
    .withMessage('Customer ID is required')
    .isString()
    .withMessage('Customer ID must be a string'),
  amountField('amount'),
  currencyField(),
  body('installmentId')
    .not()
    .exists()
    .withMessage('Installment charges are created by the installment service'),
  body('orderId')
    .not()
    .exists()
    .withMessage('Installment charges are created by the installment service'),
  body('splitInstructions')
    .optional({ values: 'null' })
    .isObject()
    .withMessage('Split instructions must be an object'),
];

export const getChargeValidation = [idParam('chargeId', 'Charge ID')];

export const listChargesValidation = (maxLimit: number) => [
  query('status')
    .optional()
    .isIn(Object.values(ChargeStatus))
    .withMessage(`Status must be one of: ${Object.values(ChargeStatus).join(', ')}`),
  query('customerId').optional().isString(),
  query('installmentId').optional().isString(),
  query('orderId').optional().isString(),
  ...paginationQuery(maxLimit),
];
