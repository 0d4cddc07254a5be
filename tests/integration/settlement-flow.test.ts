/**
 * Installment order to webhook, through the queue processors
 *
 * The BullMQ queues are replaced by recorders; each recorded job is handed
 * to the same processor the worker runs.
 */

import {
  createSettlementProcessor,
  createWebhookProcessor,
  SettleChargeJobResult,
  WebhookJobResult,
} from '../../src/queues';
import { WebhookEventType } from '../../src/types/events';
import { createTestContext, TEST_WEBHOOK_URL, TestContext } from '../helpers';

describe('Installment settlement flow', () => {
  let ctx: TestContext;
  let now: Date;

  beforeEach(() => {
    now = new Date('2026-01-01T00:00:00.000Z');
    ctx = createTestContext({ clock: () => now });
  });

  const settleQueued = async () => {
    const settle = createSettlementProcessor(ctx.services.settlementService);
    const results: SettleChargeJobResult[] = [];
    for (const chargeId of ctx.settlementQueue.chargeIds.splice(0)) {
      results.push(await settle({ id: chargeId, data: { chargeId }, attemptsMade: 0 }));
    }
    return results;
  };

  const deliverQueued = async () => {
    const notify = createWebhookProcessor(ctx.services.webhookService);
    const results: WebhookJobResult[] = [];
    for (const { eventType, chargeId } of ctx.notificationQueue.events.splice(0)) {
      results.push(
        await notify({ id: `${eventType}-${chargeId}`, data: { eventType, chargeId }, attemptsMade: 0 })
      );
    }
    return results;
  };

  it('pays the first installment from the wallet and tops up the second externally', async () => {
    await ctx.services.walletService.createWallet('cust_1');
    await ctx.services.walletService.credit('cust_1', 70);
    ctx.processor.succeedWith('ext_flow_2');
    const { order, installments } = await ctx.services.installmentService.createOrder({
      customerId: 'cust_1',
      totalAmount: 100,
      installmentCount: 2,
    });

    // First installment falls due
    now = new Date('2026-02-01T00:00:00.000Z');
    const firstSweep = await ctx.services.installmentService.processDueInstallments();
    expect(firstSweep.processedCount).toBe(1);
    expect(await settleQueued()).toEqual([{ outcome: 'succeeded' }]);

    const firstCharge = await ctx.services.chargeService.getCharge(firstSweep.chargeIds[0]);
    expect(firstCharge).toMatchObject({ paymentMethod: 'wallet', walletAmount: 50, amount: 50 });
    expect(ctx.processor.requests).toHaveLength(0);
    expect((await ctx.services.installmentService.getInstallment(installments[0].installmentId)).status).toBe('paid');
    expect((await ctx.services.installmentService.getOrder(order.orderId)).status).toBe('pending');

    // Second installment: 20 left in the wallet, 30 from the processor
    now = new Date('2026-03-03T00:00:00.000Z');
    const secondSweep = await ctx.services.installmentService.processDueInstallments();
    expect(secondSweep.processedCount).toBe(1);
    expect(await settleQueued()).toEqual([{ outcome: 'succeeded' }]);

    const secondCharge = await ctx.services.chargeService.getCharge(secondSweep.chargeIds[0]);
    expect(secondCharge).toMatchObject({
      status: 'succeeded',
      paymentMethod: 'external',
      walletAmount: 20,
      externalChargeId: 'ext_flow_2',
    });
    expect(ctx.processor.requests.map((req) => [req.amountMinor, req.currency])).toEqual([[3000, 'usd']]);
    expect((await ctx.services.walletService.getWallet('cust_1')).balance).toBe(0);
    expect((await ctx.services.installmentService.getOrder(order.orderId)).status).toBe('completed');

    // Both notifications reach the subscriber
    const deliveries = await deliverQueued();
    expect(deliveries.map((delivery) => delivery.status)).toEqual(['processed', 'processed']);
    expect(ctx.transport.posts.map((post) => post.url)).toEqual([TEST_WEBHOOK_URL, TEST_WEBHOOK_URL]);
    expect(ctx.transport.posts[1].payload).toMatchObject({
      event_type: WebhookEventType.CHARGE_SUCCEEDED,
      charge_id: secondCharge.chargeId,
      amount: 50,
      currency: 'USD',
      status: 'succeeded',
      payment_method: 'external',
      external_charge_id: 'ext_flow_2',
      metadata: {
        installment_id: installments[1].installmentId,
        installment_order_id: order.orderId,
      },
    });

    const reconciliation = await ctx.services.walletService.reconcile('cust_1');
    expect(reconciliation.consistent).toBe(true);
  });

  it('fails the installment and notifies when the card is declined', async () => {
    ctx.processor.declineWith('Insufficient card funds');
    const { installments } = await ctx.services.installmentService.createOrder({
      customerId: 'cust_2',
      totalAmount: 40,
      installmentCount: 1,
    });

    now = new Date('2026-02-01T00:00:00.000Z');
    await ctx.services.installmentService.processDueInstallments();
    expect(await settleQueued()).toEqual([{ outcome: 'failed' }]);

    expect((await ctx.services.installmentService.getInstallment(installments[0].installmentId)).status).toBe('failed');
    expect(ctx.notificationQueue.events.map((event) => event.eventType)).toEqual([
      WebhookEventType.CHARGE_FAILED,
    ]);

    await deliverQueued();
    expect(ctx.transport.posts[0].payload).toMatchObject({ status: 'failed', payment_method: 'external' });
  });

  it('settles each charge once when the job is delivered twice', async () => {
    await ctx.services.walletService.createWallet('cust_3');
    await ctx.services.walletService.credit('cust_3', 100);
    const charge = await ctx.services.chargeService.createCharge({
      customerId: 'cust_3',
      amount: 60,
      currency: 'USD',
    });
    const settle = createSettlementProcessor(ctx.services.settlementService);
    const job = { id: charge.chargeId, data: { chargeId: charge.chargeId }, attemptsMade: 0 };

    const first = await settle(job);
    const second = await settle({ ...job, attemptsMade: 1 });

    expect(first).toEqual({ outcome: 'succeeded' });
    expect(second).toEqual({ outcome: 'skipped' });
    expect((await ctx.services.walletService.getWallet('cust_3')).balance).toBe(40);
    expect(ctx.notificationQueue.events).toHaveLength(1);
  });
});
