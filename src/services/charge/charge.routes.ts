import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { ChargeController } from './charge.controller';
import {
  createChargeValidation,
  getChargeValidation,
  listChargesValidation,
} from './charge.validation';

export const createChargeRoutes = (controller: ChargeController, maxPageLimit: number): Router => {
  const router = Router();

  // POST /charges - Create a charge and queue settlement
  router.post(
    '/',
    createChargeValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.create(req, res, next)
  );

  // GET /charges - List charges
  router.get(
    '/',
    listChargesValidation(maxPageLimit),
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.list(req, res, next)
  );

  // GET /charges/:chargeId - Get charge by ID
  router.get(
    '/:chargeId',
    getChargeValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getById(req, res, next)
  );

  return router;
};
