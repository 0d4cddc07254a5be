import { Request, Response, NextFunction } from 'express';

import { OrderFilter } from '../../stores/installment.store';
import { OrderStatus } from '../../types/events';
import { queryString, readPage } from '../../utils/request';

import { InstallmentService } from './installment.service';

const ORDER_STATUSES: string[] = Object.values(OrderStatus);

const isOrderStatus = (value: string | undefined): value is OrderStatus =>
  value !== undefined && ORDER_STATUSES.includes(value);

export class InstallmentController {
  constructor(
    private readonly installmentService: InstallmentService,
    private readonly maxPageLimit: number
  ) {}

  /**
   * Create an order with its installment schedule
   * POST /installments/orders
   */
  async createOrder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId, totalAmount, currency, installmentCount, installmentAmount } = req.body;

      const result = await this.installmentService.createOrder({
        customerId,
        totalAmount,
        currency,
        installmentCount,
        installmentAmount,
      });

      res.status(201).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List orders
   * GET /installments/orders
   */
  async listOrders(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const status = queryString(req, 'status');
      const filter: OrderFilter = {
        customerId: queryString(req, 'customerId'),
        status: isOrderStatus(status) ? status : undefined,
      };

      const result = await this.installmentService.listOrders(
        filter,
        readPage(req, this.maxPageLimit)
      );

      res.status(200).json({
        success: true,
        data: {
          orders: result.items,
          pagination: { total: result.total, limit: result.limit, offset: result.offset },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /installments/orders/:orderId
   */
  async getOrder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const order = await this.installmentService.getOrder(req.params.orderId);

      res.status(200).json({
        success: true,
        data: { order },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /installments/orders/:orderId/installments
   */
  async getOrderInstallments(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const installments = await this.installmentService.getOrderInstallments(
        req.params.orderId
      );

      res.status(200).json({
        success: true,
        data: { installments },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /installments/orders/:orderId/activate
   */
  async activateOrder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const order = await this.installmentService.activateOrder(req.params.orderId);

      res.status(200).json({
        success: true,
        data: { order },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Pending installments due now, or as of `asOf`
   * GET /installments/due
   */
  async getDue(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const asOf = queryString(req, 'asOf');
      const installments = await this.installmentService.getDueInstallments(
        asOf ? new Date(asOf) : undefined
      );

      res.status(200).json({
        success: true,
        data: { installments },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Run the due-installment sweep now
   * POST /installments/due/process
   */
  async processDue(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.installmentService.processDueInstallments();

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /installments/:installmentId
   */
  async getInstallment(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const installment = await this.installmentService.getInstallment(req.params.installmentId);

      res.status(200).json({
        success: true,
        data: { installment },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Charge one installment now
   * POST /installments/:installmentId/process
   */
  async processInstallment(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.installmentService.processInstallment(req.params.installmentId);

      res.status(202).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }
}
