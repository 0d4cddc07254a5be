import { Request, Response, NextFunction } from 'express';

import { readPage } from '../../utils/request';

import { WalletService } from './wallet.service';

export class WalletController {
  constructor(
    private readonly walletService: WalletService,
    private readonly maxPageLimit: number
  ) {}

  /**
   * Open a wallet
   * POST /wallets
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId, currency } = req.body;
      const wallet = await this.walletService.createWallet(customerId, currency || 'USD');

      res.status(201).json({
        success: true,
        data: { wallet },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List wallets
   * GET /wallets
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.walletService.listWallets(readPage(req, this.maxPageLimit));

      res.status(200).json({
        success: true,
        data: {
          wallets: result.items,
          pagination: { total: result.total, limit: result.limit, offset: result.offset },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Get a customer's wallet
   * GET /wallets/:customerId
   */
  async get(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const wallet = await this.walletService.getWallet(req.params.customerId);

      res.status(200).json({
        success: true,
        data: { wallet },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Top up a wallet
   * POST /wallets/:customerId/credit
   */
  async credit(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { amount, description } = req.body;
      const result = await this.walletService.credit(req.params.customerId, amount, description);

      res.status(200).json({
        success: true,
        data: {
          wallet: result.wallet,
          entry: result.entry,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Ledger entries, newest first
   * GET /wallets/:customerId/ledger
   */
  async getLedger(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.walletService.getLedger(
        req.params.customerId,
        readPage(req, this.maxPageLimit)
      );

      res.status(200).json({
        success: true,
        data: {
          entries: result.items,
          pagination: { total: result.total, limit: result.limit, offset: result.offset },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Balance against ledger audit
   * GET /wallets/:customerId/reconciliation
   */
  async reconcile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const report = await this.walletService.reconcile(req.params.customerId);

      res.status(200).json({
        success: true,
        data: report,
      });
    } catch (error) {
      next(error);
    }
  }
}
