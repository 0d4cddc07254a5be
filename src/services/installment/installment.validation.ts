import { body, query } from 'express-validator';

import { OrderStatus } from '../../types/events';
import { amountField, currencyField, idParam, paginationQuery } from '../../utils/validators';

import { MAX_INSTALLMENTS, MIN_INSTALLMENTS } from './installment.schedule';

export const createOrderValidation = [
  body('customerId')
    .notEmpty()
    .withMessage('Customer ID is required')
    .isString()
    .withMessage('Customer ID must be a string'),
  amountField('totalAmount'),
  currencyField(),
  body('installmentCount')
    .notEmpty()
    .withMessage('Installment count is required')
    .isInt({ min: MIN_INSTALLMENTS, max: MAX_INSTALLMENTS })
    .withMessage(`Installment count must be between ${MIN_INSTALLMENTS} and ${MAX_INSTALLMENTS}`)
    .toInt(),
  amountField('installmentAmount', true),
];

export const listOrdersValidation = (maxLimit: number) => [
  query('status')
    .optional()
    .isIn(Object.values(OrderStatus))
    .withMessage(`Status must be one of: ${Object.values(OrderStatus).join(', ')}`),
  query('customerId').optional().isString(),
  ...paginationQuery(maxLimit),
];

export const orderIdValidation = [idParam('orderId', 'Order ID')];

export const installmentIdValidation = [idParam('installmentId', 'Installment ID')];

export const dueQueryValidation = [
  query('asOf').optional().isISO8601().withMessage('asOf must be an ISO 8601 date'),
];
