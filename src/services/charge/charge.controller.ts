import { Request, Response, NextFunction } from 'express';

import { ChargeFilter } from '../../stores/charge.store';
import { ChargeStatus } from '../../types/events';
import { queryString, readPage } from '../../utils/request';

import { ChargeService } from './charge.service';

const CHARGE_STATUSES: string[] = Object.values(ChargeStatus);

const isChargeStatus = (value: string | undefined): value is ChargeStatus =>
  value !== undefined && CHARGE_STATUSES.includes(value);

export class ChargeController {
  constructor(
    private readonly chargeService: ChargeService,
    private readonly maxPageLimit: number
  ) {}

  /**
   * Create a charge and queue it for settlement
   * POST /charges
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId, amount, currency, splitInstructions } = req.body;

      const charge = await this.chargeService.createCharge({
        customerId,
        amount,
        currency: currency || 'USD',
        splitInstructions,
      });

      res.status(201).json({
        success: true,
        data: { charge },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Get charge by ID
   * GET /charges/:chargeId
   */
  async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const charge = await this.chargeService.getCharge(req.params.chargeId);

      res.status(200).json({
        success: true,
        data: { charge },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List charges
   * GET /charges
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const status = queryString(req, 'status');
      const filter: ChargeFilter = {
        customerId: queryString(req, 'customerId'),
        installmentId: queryString(req, 'installmentId'),
        orderId: queryString(req, 'orderId'),
        status: isChargeStatus(status) ? status : undefined,
      };

      const result = await this.chargeService.listCharges(filter, readPage(req, this.maxPageLimit));

      res.status(200).json({
        success: true,
        data: {
          charges: result.items,
          pagination: { total: result.total, limit: result.limit, offset: result.offset },
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
