import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { InstallmentController } from './installment.controller';
import {
  createOrderValidation,
  dueQueryValidation,
  installmentIdValidation,
  listOrdersValidation,
  orderIdValidation,
} from './installment.validation';

export const createInstallmentRoutes = (
  controller: InstallmentController,
  maxPageLimit: number
): Router => {
  const router = Router();

  // POST /installments/orders - Create an order and its schedule
  router.post(
    '/orders',
    createOrderValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.createOrder(req, res, next)
  );

  // GET /installments/orders - List orders
  router.get(
    '/orders',
    listOrdersValidation(maxPageLimit),
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listOrders(req, res, next)
  );

  // GET /installments/orders/:orderId - Get an order
  router.get(
    '/orders/:orderId',
    orderIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getOrder(req, res, next)
  );

  // GET /installments/orders/:orderId/installments - The order's schedule
  router.get(
    '/orders/:orderId/installments',
    orderIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.getOrderInstallments(req, res, next)
  );

  // POST /installments/orders/:orderId/activate - pending -> active
  router.post(
    '/orders/:orderId/activate',
    orderIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.activateOrder(req, res, next)
  );

  // GET /installments/due - Pending installments that are due
  router.get(
    '/due',
    dueQueryValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getDue(req, res, next)
  );

  // POST /installments/due/process - Run the due sweep now
  router.post('/due/process', (req: Request, res: Response, next: NextFunction) =>
    controller.processDue(req, res, next)
  );

  // GET /installments/:installmentId - Get an installment
  router.get(
    '/:installmentId',
    installmentIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getInstallment(req, res, next)
  );

  // POST /installments/:installmentId/process - Charge one installment now
  router.post(
    '/:installmentId/process',
    installmentIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.processInstallment(req, res, next)
  );

  return router;
};
