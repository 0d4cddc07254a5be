import request from 'supertest';

import { ErrorCode } from '../../src/types/errors';
import { createTestContext, TestContext } from '../helpers';

describe('Charge Endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('POST /charges', () => {
    it('should create a pending charge and queue its settlement', async () => {
      const response = await request(ctx.app)
        .post('/charges')
        .send({ customerId: 'cust_1', amount: 49.99, currency: 'usd' });

      expect(response.status).toBe(201);
      expect(response.body.data.charge).toMatchObject({
        customerId: 'cust_1',
        amount: 49.99,
        currency: 'USD',
        status: 'pending',
        walletAmount: 0,
        paymentMethod: null,
      });
      expect(ctx.settlementQueue.chargeIds).toEqual([response.body.data.charge.chargeId]);
    });

    it('should keep split instructions as given', async () => {
      const splitInstructions = { merchant_id: 'm_1', share: 0.9 };

      const response = await request(ctx.app)
        .post('/charges')
        .send({ customerId: 'cust_1', amount: 10, splitInstructions });

      expect(response.status).toBe(201);
      expect(response.body.data.charge.splitInstructions).toEqual(splitInstructions);
    });

    it('should reject a missing amount', async () => {
      const response = await request(ctx.app).post('/charges').send({ customerId: 'cust_1' });

      expect(response.status).toBe(400);
      expect(response.body.error.details.amount).toContain('amount is required');
      expect(ctx.settlementQueue.chargeIds).toEqual([]);
    });

    it('should reject an amount written in exponent notation', async () => {
      const response = await request(ctx.app)
        .post('/charges')
        .set('Content-Type', 'application/json')
        .send('{"customerId":"cust_1","amount":1e-7}');

      expect(response.status).toBe(400);
      expect(response.body.error.details.amount).toEqual(['amount must be a plain decimal number']);
      expect(ctx.settlementQueue.chargeIds).toEqual([]);
    });

    it('should reject a charge that names an installment', async () => {
      const response = await request(ctx.app)
        .post('/charges')
        .send({ customerId: 'cust_2', amount: 0.01, installmentId: 'ins_1', orderId: 'ord_1' });

      expect(response.status).toBe(400);
      expect(response.body.error.details.installmentId).toEqual([
        'Installment charges are created by the installment service',
      ]);
      expect(response.body.error.details.orderId).toEqual([
        'Installment charges are created by the installment service',
      ]);
      expect(ctx.settlementQueue.chargeIds).toEqual([]);
    });

    it('should answer 503 when settlement cannot be queued', async () => {
      ctx.settlementQueue.failWith = new Error('redis down');

      const response = await request(ctx.app)
        .post('/charges')
        .send({ customerId: 'cust_1', amount: 10 });

      expect(response.status).toBe(503);
      expect(response.body.error.code).toBe(ErrorCode.QUEUE_ERROR);
    });
  });

  describe('GET /charges/:chargeId', () => {
    it('should return the charge after settlement from the wallet', async () => {
      await ctx.services.walletService.createWallet('cust_1');
      await ctx.services.walletService.credit('cust_1', 100);
      const created = await request(ctx.app)
        .post('/charges')
        .send({ customerId: 'cust_1', amount: 30 });
      const chargeId: string = created.body.data.charge.chargeId;

      await ctx.services.settlementService.settle(chargeId);
      const response = await request(ctx.app).get(`/charges/${chargeId}`);

      expect(response.status).toBe(200);
      expect(response.body.data.charge).toMatchObject({
        status: 'succeeded',
        paymentMethod: 'wallet',
        walletAmount: 30,
        externalChargeId: null,
      });
    });

    it('should return 404 for an unknown charge', async () => {
      const response = await request(ctx.app).get('/charges/chg_unknown');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.CHARGE_NOT_FOUND);
    });
  });

  describe('GET /charges', () => {
    it('should filter by status', async () => {
      const first = await request(ctx.app).post('/charges').send({ customerId: 'cust_1', amount: 5 });
      await request(ctx.app).post('/charges').send({ customerId: 'cust_1', amount: 6 });
      ctx.processor.declineWith('Card declined');
      await ctx.services.settlementService.settle(first.body.data.charge.chargeId);

      const response = await request(ctx.app).get('/charges?status=failed');

      expect(response.status).toBe(200);
      expect(response.body.data.charges).toHaveLength(1);
      expect(response.body.data.charges[0].chargeId).toBe(first.body.data.charge.chargeId);
      expect(response.body.data.charges[0].failureReason).toBe('Card declined');
    });

    it('should reject an unknown status', async () => {
      const response = await request(ctx.app).get('/charges?status=refunded');

      expect(response.status).toBe(400);
      expect(response.body.error.details.status).toEqual([
        'Status must be one of: pending, processing, succeeded, failed',
      ]);
    });
  });
});
