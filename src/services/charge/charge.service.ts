import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, Logger } from '../../observability';
import { SettlementQueue } from '../../queues/queue.types';
import { ChargeFilter, ChargeStore, CreateChargeInput } from '../../stores/charge.store';
import { ChargeStatus, PaymentMethod } from '../../types/events';
import { ChargeRecord, Page, PageResult } from '../../types/records';
import { roundMoney, toMinorUnits } from '../../utils/money';

import { getSourceStates, validateTransition } from './charge.state';

/**
 * Ad-hoc charges carry no installment references; those are attached by the installment sweep.
 */
export type NewChargeInput = Omit<CreateChargeInput, 'installmentId' | 'orderId'>;

export interface SetChargeStatusOptions {
  paymentMethod?: PaymentMethod | null;
  externalChargeId?: string | null;
  failureReason?: string | null;
}

export class ChargeService {
  constructor(
    private readonly store: ChargeStore,
    private readonly settlementQueue: SettlementQueue,
    private readonly log: Logger = createServiceLogger('charge-service')
  ) {}

  /**
   * Create a pending charge and hand it to the settlement queue
   */
  async createCharge(input: NewChargeInput): Promise<ChargeRecord> {
    if (!(toMinorUnits(input.amount) > 0)) {
      throw ApiError.invalidAmount('Charge amount must be at least one cent');
    }

    const charge = await this.store.create({
      customerId: input.customerId,
      amount: roundMoney(input.amount),
      currency: input.currency.toUpperCase(),
      splitInstructions: input.splitInstructions,
    });
    this.log.info(
      { chargeId: charge.chargeId, customerId: charge.customerId, amount: charge.amount },
      'Charge created'
    );

    try {
      await this.settlementQueue.enqueueSettlement(charge.chargeId);
    } catch (error) {
      this.log.error({ err: error, chargeId: charge.chargeId }, 'Failed to enqueue settlement');
      throw ApiError.queue(`Charge ${charge.chargeId} created but settlement could not be queued`);
    }

    return charge;
  }

  async getCharge(chargeId: string): Promise<ChargeRecord> {
    const charge = await this.store.findById(chargeId);
    if (!charge) {
      throw ApiError.notFound('Charge');
    }
    return charge;
  }

  async listCharges(filter: ChargeFilter, page: Page): Promise<PageResult<ChargeRecord>> {
    return this.store.list(filter, page);
  }

  /**
   * Move a charge to `status` through a conditional update.
   * A terminal status is never overwritten.
   */
  async setStatus(
    chargeId: string,
    status: ChargeStatus,
    options: SetChargeStatusOptions = {}
  ): Promise<ChargeRecord> {
    const updated = await this.store.transition(chargeId, getSourceStates(status), {
      status,
      ...options,
    });
    if (updated) {
      return updated;
    }

    const current = await this.getCharge(chargeId);
    validateTransition(current.status, status, chargeId);
    // Transition was legal from the status we just read, so the charge moved underneath us
    throw ApiError.concurrentModification(`Charge ${chargeId} changed during update`);
  }
}
