import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { WalletController } from './wallet.controller';
import {
  createWalletValidation,
  creditValidation,
  customerParamValidation,
  ledgerQueryValidation,
  listWalletsValidation,
} from './wallet.validation';

export const createWalletRoutes = (controller: WalletController, maxPageLimit: number): Router => {
  const router = Router();

  // GET /wallets - List wallets
  router.get('/', listWalletsValidation(maxPageLimit), validateRequest, (req: Request, res: Response, next: NextFunction) => controller.list(req, res, next));

  // POST /wallets - Open a wallet for a customer
  router.post('/', createWalletValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.create(req, res, next));

  // GET /wallets/:customerId - Get a customer's wallet
  router.get('/:customerId', customerParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.get(req, res, next));

  // GET /wallets/:customerId/ledger - Ledger entries
  router.get('/:customerId/ledger', ledgerQueryValidation(maxPageLimit), validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getLedger(req, res, next));

  // POST /wallets/:customerId/credit - Top up
  router.post('/:customerId/credit', creditValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.credit(req, res, next));

  // GET /wallets/:customerId/reconciliation - Balance vs ledger audit
  router.get('/:customerId/reconciliation', customerParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.reconcile(req, res, next));

  return router;
};
