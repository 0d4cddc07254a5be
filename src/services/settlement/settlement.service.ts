/**
 * Settlement Engine
 *
 * Settles a charge wallet-first: the customer's wallet covers as much as it
 * can and the external processor is asked only for the shortfall. A wallet
 * debit taken ahead of a declined processor charge is credited back before
 * the charge is marked failed.
 *
 * Per-charge idempotency comes from the pending -> processing claim; a charge
 * that is not pending is skipped without side effects.
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  compensationsTotal,
  createServiceLogger,
  Logger,
  settledAmount,
  settlementDuration,
  settlementsTotal,
  traceSettlement,
  walletOperationsTotal,
} from '../../observability';
import { NotificationQueue } from '../../queues/queue.types';
import { ChargeStore } from '../../stores/charge.store';
import { InstallmentStore } from '../../stores/installment.store';
import { WalletStore } from '../../stores/wallet.store';
import { ErrorCode } from '../../types/errors';
import {
  ChargeStatus,
  InstallmentStatus,
  LedgerEntryType,
  OrderStatus,
  PaymentMethod,
  WebhookEventType,
} from '../../types/events';
import { ChargeRecord, WalletRecord } from '../../types/records';
import { roundMoney, subtractMoney, toMinorUnits } from '../../utils/money';
import { isTerminalState } from '../charge/charge.state';
import { PaymentProcessor, PaymentProcessorError } from '../payment-processor';

import {
  SettlementFailed,
  SettlementResult,
  SettlementSucceeded,
} from './settlement.types';

export interface SettlementDependencies {
  charges: ChargeStore;
  wallets: WalletStore;
  installments: InstallmentStore;
  processor: PaymentProcessor;
  notifications: NotificationQueue;
  logger?: Logger;
}

/**
 * What this attempt has done so far. Compensation depends on it.
 */
interface SettlementProgress {
  claimed: boolean;
  walletId: string | null;
  walletDebited: number;
  paymentCaptured: boolean;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class SettlementService {
  private readonly charges: ChargeStore;
  private readonly wallets: WalletStore;
  private readonly installments: InstallmentStore;
  private readonly processor: PaymentProcessor;
  private readonly notifications: NotificationQueue;
  private readonly log: Logger;

  constructor(deps: SettlementDependencies) {
    this.charges = deps.charges;
    this.wallets = deps.wallets;
    this.installments = deps.installments;
    this.processor = deps.processor;
    this.notifications = deps.notifications;
    this.log = deps.logger ?? createServiceLogger('settlement');
  }

  /**
   * Settle one charge. Never throws; every outcome is a SettlementResult.
   */
  async settle(chargeId: string): Promise<SettlementResult> {
    const startedAt = process.hrtime.bigint();

    const result = await traceSettlement(chargeId, async (span) => {
      const settled = await this.runSettlement(chargeId);
      span.setAttribute('settlement.outcome', settled.outcome);
      return settled;
    });

    const method =
      result.outcome === 'succeeded' || result.outcome === 'failed' ? result.paymentMethod : 'none';
    settlementsTotal.inc({ outcome: result.outcome, method });
    settlementDuration.observe(
      { outcome: result.outcome },
      Number(process.hrtime.bigint() - startedAt) / 1e9
    );

    return result;
  }

  private async runSettlement(chargeId: string): Promise<SettlementResult> {
    const log = this.log.child({ chargeId });
    const progress: SettlementProgress = {
      claimed: false,
      walletId: null,
      walletDebited: 0,
      paymentCaptured: false,
    };

    try {
      const charge = await this.charges.findById(chargeId);
      if (!charge) {
        log.warn('Charge not found');
        return {
          outcome: 'error',
          chargeId,
          errorCode: ErrorCode.CHARGE_NOT_FOUND,
          message: `Charge ${chargeId} not found`,
          retryable: false,
        };
      }

      if (charge.status !== ChargeStatus.PENDING) {
        const reason = isTerminalState(charge.status) ? 'ALREADY_SETTLED' : 'IN_PROGRESS';
        log.info({ status: charge.status, reason }, 'Charge is not pending, skipping');
        return { outcome: 'skipped', chargeId, status: charge.status, reason };
      }

      const claimed = await this.charges.transition(chargeId, [ChargeStatus.PENDING], {
        status: ChargeStatus.PROCESSING,
      });
      if (!claimed) {
        const current = await this.charges.findById(chargeId);
        log.info('Charge claimed by another worker, skipping');
        return {
          outcome: 'skipped',
          chargeId,
          status: current?.status ?? ChargeStatus.PROCESSING,
          reason: 'CLAIM_LOST',
        };
      }
      progress.claimed = true;

      return await this.runWaterfall(claimed, progress, log);
    } catch (error) {
      if (progress.walletId && progress.walletDebited > 0 && !progress.paymentCaptured) {
        await this.compensateAfterError(progress.walletId, progress.walletDebited, chargeId, log);
      }

      log.error({ err: error, claimed: progress.claimed }, 'Settlement aborted');
      return {
        outcome: 'error',
        chargeId,
        errorCode: error instanceof ApiError ? error.errorCode : ErrorCode.INTERNAL_ERROR,
        message: errorMessage(error),
        retryable: !progress.claimed,
      };
    }
  }

  private async runWaterfall(
    charge: ChargeRecord,
    progress: SettlementProgress,
    log: Logger
  ): Promise<SettlementResult> {
    let remaining = roundMoney(charge.amount);

    const wallet = await this.wallets.findByCustomerId(charge.customerId);
    if (wallet && this.isUsable(wallet, charge, log)) {
      progress.walletId = wallet.walletId;
      progress.walletDebited = await this.debitWallet(wallet, charge, remaining, log);
      remaining = subtractMoney(remaining, progress.walletDebited);
    }

    if (toMinorUnits(remaining) <= 0) {
      progress.paymentCaptured = true;
      return this.completeSucceeded(charge, {
        paymentMethod: PaymentMethod.WALLET,
        walletAmount: progress.walletDebited,
        externalAmount: 0,
        externalChargeId: null,
      }, log);
    }

    let externalChargeId: string;
    try {
      const response = await this.processor.charge({
        amountMinor: toMinorUnits(remaining),
        currency: charge.currency.toLowerCase(),
        customerReference: charge.customerId,
        description: `Installment payment - Charge ${charge.chargeId}`,
        metadata: {
          charge_id: charge.chargeId,
          installment_id: charge.installmentId,
          installment_order_id: charge.orderId,
        },
        idempotencyKey: charge.chargeId,
      });
      externalChargeId = response.externalChargeId;
    } catch (error) {
      if (!(error instanceof PaymentProcessorError)) {
        throw error;
      }
      return this.handleProcessorFailure(charge, progress, error, log);
    }

    progress.paymentCaptured = true;
    settledAmount.observe({ source: PaymentMethod.EXTERNAL }, remaining);
    log.info({ externalChargeId, externalAmount: remaining }, 'Processor charge succeeded');

    return this.completeSucceeded(charge, {
      paymentMethod: PaymentMethod.EXTERNAL,
      walletAmount: progress.walletDebited,
      externalAmount: remaining,
      externalChargeId,
    }, log);
  }

  private isUsable(wallet: WalletRecord, charge: ChargeRecord, log: Logger): boolean {
    if (!wallet.isActive) {
      log.info({ walletId: wallet.walletId }, 'Wallet inactive, skipping wallet funds');
      return false;
    }
    if (wallet.currency !== charge.currency) {
      log.warn(
        { walletId: wallet.walletId, walletCurrency: wallet.currency, chargeCurrency: charge.currency },
        'Wallet currency differs from charge currency, skipping wallet funds'
      );
      return false;
    }
    return toMinorUnits(wallet.balance) > 0;
  }

  /**
   * Debit up to `amount` from the wallet and return what was taken.
   * A concurrent debit can leave less than we read; retry once against the
   * balance the store observed.
   */
  private async debitWallet(
    wallet: WalletRecord,
    charge: ChargeRecord,
    amount: number,
    log: Logger
  ): Promise<number> {
    let available = wallet.balance;

    for (let attempt = 1; attempt <= 2; attempt += 1) {
      if (toMinorUnits(available) <= 0) {
        return 0;
      }

      const full = toMinorUnits(available) >= toMinorUnits(amount);
      const debitAmount = full ? amount : roundMoney(available);

      const result = await this.wallets.applyTransaction({
        walletId: wallet.walletId,
        amount: debitAmount,
        type: LedgerEntryType.DEBIT,
        description: full
          ? `Payment for charge ${charge.chargeId}`
          : `Partial payment for charge ${charge.chargeId}`,
        referenceId: charge.chargeId,
      });

      if (result.ok) {
        walletOperationsTotal.inc({ operation: LedgerEntryType.DEBIT, result: 'applied' });
        settledAmount.observe({ source: PaymentMethod.WALLET }, debitAmount);
        log.info(
          { walletId: wallet.walletId, debited: debitAmount, balance: result.wallet.balance },
          full ? 'Wallet debited' : 'Wallet partially debited'
        );
        return debitAmount;
      }

      walletOperationsTotal.inc({
        operation: LedgerEntryType.DEBIT,
        result: result.reason.toLowerCase(),
      });

      if (result.reason === 'WALLET_NOT_FOUND') {
        log.warn({ walletId: wallet.walletId }, 'Wallet disappeared before debit');
        return 0;
      }

      log.warn(
        { walletId: wallet.walletId, observedBalance: result.balance, attempt },
        'Wallet balance changed during debit'
      );
      available = result.balance;
    }

    return 0;
  }

  private async handleProcessorFailure(
    charge: ChargeRecord,
    progress: SettlementProgress,
    error: PaymentProcessorError,
    log: Logger
  ): Promise<SettlementResult> {
    log.warn({ code: error.code, reason: error.message }, 'Processor charge failed');

    let refundedAmount = 0;
    let refundError: string | null = null;

    if (progress.walletId && progress.walletDebited > 0) {
      try {
        await this.refundWallet(progress.walletId, progress.walletDebited, charge.chargeId);
        refundedAmount = progress.walletDebited;
        progress.walletDebited = 0;
        compensationsTotal.inc({ result: 'success' });
        log.info({ refundedAmount }, 'Partial wallet debit refunded');
      } catch (refundFailure) {
        refundError = errorMessage(refundFailure);
        compensationsTotal.inc({ result: 'failure' });
        log.error({ err: refundFailure }, 'Refund after processor failure did not complete');
      }
    }

    const failureReason = refundError
      ? `${error.message}; refund failed: ${refundError}`
      : error.message;

    return this.completeFailed(charge, {
      paymentMethod: PaymentMethod.EXTERNAL,
      walletAmount: progress.walletDebited,
      externalAmount: 0,
      externalChargeId: null,
      failureReason,
      refundedAmount,
    }, log);
  }

  private async refundWallet(walletId: string, amount: number, chargeId: string): Promise<void> {
    const result = await this.wallets.applyTransaction({
      walletId,
      amount,
      type: LedgerEntryType.CREDIT,
      description: `Refund for failed charge ${chargeId}`,
      referenceId: chargeId,
    });

    if (!result.ok) {
      walletOperationsTotal.inc({ operation: LedgerEntryType.CREDIT, result: 'not_found' });
      throw ApiError.notFound('Wallet');
    }
    walletOperationsTotal.inc({ operation: LedgerEntryType.CREDIT, result: 'applied' });
  }

  private async compensateAfterError(
    walletId: string,
    amount: number,
    chargeId: string,
    log: Logger
  ): Promise<void> {
    try {
      await this.refundWallet(walletId, amount, chargeId);
      compensationsTotal.inc({ result: 'success' });
      log.warn({ refundedAmount: amount }, 'Wallet debit refunded after settlement error');
    } catch (error) {
      compensationsTotal.inc({ result: 'failure' });
      log.error({ err: error, walletId, amount }, 'Compensation after settlement error failed');
    }
  }

  private async completeSucceeded(
    charge: ChargeRecord,
    details: Omit<SettlementSucceeded, 'outcome' | 'chargeId' | 'followUpErrors'>,
    log: Logger
  ): Promise<SettlementSucceeded> {
    const updated = await this.markTerminal(charge.chargeId, {
      status: ChargeStatus.SUCCEEDED,
      paymentMethod: details.paymentMethod,
      externalChargeId: details.externalChargeId,
      walletAmount: details.walletAmount,
    });
    log.info(
      { paymentMethod: details.paymentMethod, walletAmount: details.walletAmount },
      'Charge succeeded'
    );

    const followUpErrors = await this.runFollowUps(updated, WebhookEventType.CHARGE_SUCCEEDED, log);
    return { outcome: 'succeeded', chargeId: charge.chargeId, ...details, followUpErrors };
  }

  private async completeFailed(
    charge: ChargeRecord,
    details: Omit<SettlementFailed, 'outcome' | 'chargeId' | 'followUpErrors'>,
    log: Logger
  ): Promise<SettlementFailed> {
    const updated = await this.markTerminal(charge.chargeId, {
      status: ChargeStatus.FAILED,
      paymentMethod: details.paymentMethod,
      walletAmount: details.walletAmount,
      failureReason: details.failureReason,
    });
    log.info({ failureReason: details.failureReason }, 'Charge failed');

    const followUpErrors = await this.runFollowUps(updated, WebhookEventType.CHARGE_FAILED, log);
    return { outcome: 'failed', chargeId: charge.chargeId, ...details, followUpErrors };
  }

  private async markTerminal(
    chargeId: string,
    update: {
      status: ChargeStatus.SUCCEEDED | ChargeStatus.FAILED;
      paymentMethod: PaymentMethod;
      walletAmount: number;
      externalChargeId?: string | null;
      failureReason?: string;
    }
  ): Promise<ChargeRecord> {
    const updated = await this.charges.transition(chargeId, [ChargeStatus.PROCESSING], update);
    if (!updated) {
      throw ApiError.concurrentModification(
        `Charge ${chargeId} left processing before settlement completed`
      );
    }
    return updated;
  }

  /**
   * Installment, order and notification updates. Failures here are reported
   * on the result and never undo the settlement.
   */
  private async runFollowUps(
    charge: ChargeRecord,
    eventType: WebhookEventType,
    log: Logger
  ): Promise<string[]> {
    const followUpErrors: string[] = [];

    if (charge.installmentId) {
      try {
        await this.updateInstallment(charge, charge.installmentId, log);
      } catch (error) {
        followUpErrors.push(`installment: ${errorMessage(error)}`);
        log.error({ err: error, installmentId: charge.installmentId }, 'Installment update failed');
      }
    }

    try {
      await this.notifications.enqueueWebhook(eventType, charge.chargeId);
    } catch (error) {
      followUpErrors.push(`notification: ${errorMessage(error)}`);
      log.error({ err: error, eventType }, 'Failed to enqueue charge notification');
    }

    return followUpErrors;
  }

  private async updateInstallment(
    charge: ChargeRecord,
    installmentId: string,
    log: Logger
  ): Promise<void> {
    const installment = await this.installments.findInstallmentById(installmentId);
    if (!installment) {
      throw ApiError.notFound('Installment');
    }

    if (installment.chargeId !== charge.chargeId) {
      log.warn(
        { installmentId, currentChargeId: installment.chargeId },
        'Installment is not attached to this charge, leaving it unchanged'
      );
      return;
    }

    const paid = charge.status === ChargeStatus.SUCCEEDED;
    const updated = await this.installments.transitionInstallment(
      installmentId,
      paid
        ? [
            InstallmentStatus.PENDING,
            InstallmentStatus.PROCESSING,
            InstallmentStatus.FAILED,
            InstallmentStatus.OVERDUE,
          ]
        : [InstallmentStatus.PENDING, InstallmentStatus.PROCESSING, InstallmentStatus.OVERDUE],
      paid ? InstallmentStatus.PAID : InstallmentStatus.FAILED
    );

    if (!updated) {
      log.warn({ installmentId, status: installment.status }, 'Installment status not updated');
      return;
    }

    if (paid) {
      await this.completeOrderIfPaid(updated.orderId, log);
    }
  }

  private async completeOrderIfPaid(orderId: string, log: Logger): Promise<void> {
    const installments = await this.installments.listInstallmentsByOrder(orderId);
    const allPaid =
      installments.length > 0 &&
      installments.every((installment) => installment.status === InstallmentStatus.PAID);
    if (!allPaid) {
      return;
    }

    const order = await this.installments.updateOrderStatus(
      orderId,
      [OrderStatus.PENDING, OrderStatus.ACTIVE],
      OrderStatus.COMPLETED
    );
    if (order) {
      log.info({ orderId }, 'All installments paid, order completed');
    }
  }
}
