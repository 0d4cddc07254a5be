/**
 * Installment Service
 *
 * Creates orders with their full installment schedule and turns due
 * installments into charges. An installment is claimed (pending ->
 * processing) before its charge is created, so overlapping sweeps never
 * charge the same installment twice.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, Logger } from '../../observability';
import { SettlementQueue } from '../../queues/queue.types';
import { ChargeStore } from '../../stores/charge.store';
import {
  InstallmentStore,
  OrderFilter,
  OrderWithInstallments,
} from '../../stores/installment.store';
import { ChargeStatus, InstallmentStatus, OrderStatus } from '../../types/events';
import {
  InstallmentOrderRecord,
  InstallmentRecord,
  Page,
  PageResult,
} from '../../types/records';

import { buildInstallmentSchedule } from './installment.schedule';

export interface InstallmentServiceDependencies {
  installments: InstallmentStore;
  charges: ChargeStore;
  settlementQueue: SettlementQueue;
  clock?: () => Date;
  logger?: Logger;
}

export interface CreateOrderInput {
  customerId: string;
  totalAmount: number;
  currency?: string;
  installmentCount: number;
  installmentAmount?: number;
}

export interface InstallmentFailure {
  installmentId: string;
  error: string;
}

export interface ProcessDueResult {
  processedCount: number;
  skippedCount: number;
  chargeIds: string[];
  failures: InstallmentFailure[];
}

export type ProcessInstallmentResult =
  | { charged: true; installment: InstallmentRecord; chargeId: string }
  | { charged: false };

/** Statuses a manual trigger may start from */
const MANUAL_PROCESS_FROM = [
  InstallmentStatus.PENDING,
  InstallmentStatus.FAILED,
  InstallmentStatus.OVERDUE,
];

export class InstallmentService {
  private readonly installments: InstallmentStore;
  private readonly charges: ChargeStore;
  private readonly settlementQueue: SettlementQueue;
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(deps: InstallmentServiceDependencies) {
    this.installments = deps.installments;
    this.charges = deps.charges;
    this.settlementQueue = deps.settlementQueue;
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.logger ?? createServiceLogger('installment-service');
  }

  /**
   * Create an order and all of its installments
   */
  async createOrder(input: CreateOrderInput): Promise<OrderWithInstallments> {
    const createdAt = this.clock();
    const schedule = buildInstallmentSchedule({
      totalAmount: input.totalAmount,
      installmentCount: input.installmentCount,
      installmentAmount: input.installmentAmount,
      startDate: createdAt,
    });

    const result = await this.installments.createOrder(
      {
        customerId: input.customerId,
        totalAmount: input.totalAmount,
        currency: (input.currency || 'USD').toUpperCase(),
        installmentCount: input.installmentCount,
        installmentAmount: schedule.installmentAmount,
        createdAt,
      },
      schedule.installments
    );

    this.log.info(
      {
        orderId: result.order.orderId,
        customerId: input.customerId,
        totalAmount: input.totalAmount,
        installmentCount: input.installmentCount,
      },
      'Installment order created'
    );
    return result;
  }

  async getOrder(orderId: string): Promise<InstallmentOrderRecord> {
    const order = await this.installments.findOrderById(orderId);
    if (!order) {
      throw ApiError.notFound('Order');
    }
    return order;
  }

  async listOrders(
    filter: OrderFilter,
    page: Page
  ): Promise<PageResult<InstallmentOrderRecord>> {
    return this.installments.listOrders(filter, page);
  }

  async getOrderInstallments(orderId: string): Promise<InstallmentRecord[]> {
    await this.getOrder(orderId);
    return this.installments.listInstallmentsByOrder(orderId);
  }

  /**
   * pending -> active
   */
  async activateOrder(orderId: string): Promise<InstallmentOrderRecord> {
    const order = await this.getOrder(orderId);
    const activated = await this.installments.updateOrderStatus(
      orderId,
      [OrderStatus.PENDING],
      OrderStatus.ACTIVE
    );
    if (!activated) {
      throw ApiError.invalidTransition('order', order.status, OrderStatus.ACTIVE);
    }

    this.log.info({ orderId }, 'Order activated');
    return activated;
  }

  async getInstallment(installmentId: string): Promise<InstallmentRecord> {
    const installment = await this.installments.findInstallmentById(installmentId);
    if (!installment) {
      throw ApiError.notFound('Installment');
    }
    return installment;
  }

  async getDueInstallments(now: Date = this.clock()): Promise<InstallmentRecord[]> {
    return this.installments.findDueInstallments(now);
  }

  /**
   * Create and queue a charge for every pending installment due at or before `now`
   */
  async processDueInstallments(now: Date = this.clock()): Promise<ProcessDueResult> {
    const due = await this.installments.findDueInstallments(now);
    const result: ProcessDueResult = {
      processedCount: 0,
      skippedCount: 0,
      chargeIds: [],
      failures: [],
    };

    for (const installment of due) {
      try {
        const outcome = await this.chargeInstallment(installment.installmentId, [
          InstallmentStatus.PENDING,
        ]);
        if (outcome.charged) {
          result.processedCount += 1;
          result.chargeIds.push(outcome.chargeId);
        } else {
          result.skippedCount += 1;
        }
      } catch (error) {
        result.failures.push({
          installmentId: installment.installmentId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.log.info(
      {
        due: due.length,
        processed: result.processedCount,
        skipped: result.skippedCount,
        failed: result.failures.length,
      },
      'Due installment sweep finished'
    );
    return result;
  }

  /**
   * Manual trigger for one installment
   */
  async processInstallment(
    installmentId: string
  ): Promise<{ installment: InstallmentRecord; chargeId: string }> {
    const installment = await this.getInstallment(installmentId);
    if (!MANUAL_PROCESS_FROM.includes(installment.status)) {
      throw ApiError.invalidTransition(
        'installment',
        installment.status,
        InstallmentStatus.PROCESSING
      );
    }

    const outcome = await this.chargeInstallment(installmentId, MANUAL_PROCESS_FROM);
    if (!outcome.charged) {
      throw ApiError.concurrentModification(`Installment ${installmentId} is already being processed`);
    }
    return { installment: outcome.installment, chargeId: outcome.chargeId };
  }

  /**
   * Claim, look up the order, create the charge, record it, queue settlement.
   * Any failure after the claim hands the installment back.
   */
  private async chargeInstallment(
    installmentId: string,
    claimFrom: InstallmentStatus[]
  ): Promise<ProcessInstallmentResult> {
    const before = await this.installments.findInstallmentById(installmentId);
    if (!before) {
      throw ApiError.notFound('Installment');
    }

    const claimed = await this.installments.transitionInstallment(
      installmentId,
      claimFrom,
      InstallmentStatus.PROCESSING
    );
    if (!claimed) {
      this.log.debug({ installmentId }, 'Installment already claimed, skipping');
      return { charged: false };
    }

    let chargeId: string | null = null;
    try {
      const order = await this.installments.findOrderById(claimed.orderId);
      if (!order) {
        throw ApiError.notFound('Order');
      }

      const charge = await this.charges.create({
        customerId: order.customerId,
        amount: claimed.amount,
        currency: order.currency,
        installmentId,
        orderId: order.orderId,
      });
      chargeId = charge.chargeId;

      const attached = await this.installments.attachCharge(installmentId, charge.chargeId);
      await this.settlementQueue.enqueueSettlement(charge.chargeId);

      this.log.info(
        { installmentId, orderId: order.orderId, chargeId: charge.chargeId, amount: charge.amount },
        'Installment charge created'
      );
      return { charged: true, installment: attached ?? claimed, chargeId: charge.chargeId };
    } catch (error) {
      await this.releaseClaim(installmentId, before.status, chargeId);
      throw error;
    }
  }

  private async releaseClaim(
    installmentId: string,
    previousStatus: InstallmentStatus,
    orphanChargeId: string | null
  ): Promise<void> {
    if (orphanChargeId) {
      try {
        await this.charges.transition(orphanChargeId, [ChargeStatus.PENDING], {
          status: ChargeStatus.FAILED,
          failureReason: 'Settlement could not be queued',
        });
      } catch (error) {
        this.log.error({ err: error, chargeId: orphanChargeId }, 'Failed to retire unqueued charge');
      }
    }

    try {
      await this.installments.transitionInstallment(
        installmentId,
        [InstallmentStatus.PROCESSING],
        previousStatus
      );
      this.log.warn({ installmentId, previousStatus }, 'Installment claim released');
    } catch (error) {
      this.log.error({ err: error, installmentId }, 'Failed to release installment claim');
    }
  }
}
