import request from 'supertest';

import { ErrorCode } from '../../src/types/errors';
import { createTestContext, TestContext } from '../helpers';

describe('Installment Endpoints', () => {
  let ctx: TestContext;
  let now: Date;

  beforeEach(() => {
    now = new Date('2026-01-01T00:00:00.000Z');
    ctx = createTestContext({ clock: () => now });
  });

  const createOrder = (body: Record<string, unknown> = {}) =>
    request(ctx.app)
      .post('/installments/orders')
      .send({ customerId: 'cust_1', totalAmount: 100, installmentCount: 3, ...body });

  describe('POST /installments/orders', () => {
    it('should create the order with a 30-day schedule', async () => {
      const response = await createOrder();

      expect(response.status).toBe(201);
      expect(response.body.data.order).toMatchObject({
        customerId: 'cust_1',
        totalAmount: 100,
        currency: 'USD',
        installmentCount: 3,
        status: 'pending',
      });
      expect(
        response.body.data.installments.map(
          (installment: { sequenceNumber: number; amount: number; dueDate: string; status: string }) => [
            installment.sequenceNumber,
            installment.amount,
            installment.dueDate,
            installment.status,
          ]
        )
      ).toEqual([
        [1, 33.33, '2026-01-31T00:00:00.000Z', 'pending'],
        [2, 33.33, '2026-03-02T00:00:00.000Z', 'pending'],
        [3, 33.34, '2026-04-01T00:00:00.000Z', 'pending'],
      ]);
    });

    it('should reject an installment amount that does not add up', async () => {
      const response = await createOrder({ installmentAmount: 30 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INSTALLMENT_AMOUNT_MISMATCH);
      expect(ctx.stores.installments.orders.size).toBe(0);
    });

    it('should reject an installment count out of range', async () => {
      const response = await createOrder({ installmentCount: 25 });

      expect(response.status).toBe(400);
      expect(response.body.error.details.installmentCount).toEqual([
        'Installment count must be between 1 and 24',
      ]);
    });
  });

  describe('GET /installments/orders/:orderId', () => {
    it('should return the order and its schedule', async () => {
      const created = await createOrder();
      const orderId: string = created.body.data.order.orderId;

      const order = await request(ctx.app).get(`/installments/orders/${orderId}`);
      const schedule = await request(ctx.app).get(`/installments/orders/${orderId}/installments`);

      expect(order.status).toBe(200);
      expect(order.body.data.order.orderId).toBe(orderId);
      expect(schedule.body.data.installments).toHaveLength(3);
    });

    it('should return 404 for an unknown order', async () => {
      const response = await request(ctx.app).get('/installments/orders/ord_unknown');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.ORDER_NOT_FOUND);
    });
  });

  describe('POST /installments/orders/:orderId/activate', () => {
    it('should activate a pending order once', async () => {
      const created = await createOrder();
      const orderId: string = created.body.data.order.orderId;

      const first = await request(ctx.app).post(`/installments/orders/${orderId}/activate`);
      const second = await request(ctx.app).post(`/installments/orders/${orderId}/activate`);

      expect(first.status).toBe(200);
      expect(first.body.data.order.status).toBe('active');
      expect(second.status).toBe(409);
      expect(second.body.error.message).toBe('Invalid order state transition: active -> active');
    });
  });

  describe('due installments', () => {
    it('should list and charge only what is due', async () => {
      await createOrder();
      now = new Date('2026-02-01T00:00:00.000Z');

      const due = await request(ctx.app).get('/installments/due');
      expect(due.body.data.installments).toHaveLength(1);
      expect(due.body.data.installments[0].sequenceNumber).toBe(1);

      const processed = await request(ctx.app).post('/installments/due/process');

      expect(processed.status).toBe(200);
      expect(processed.body.data).toMatchObject({ processedCount: 1, skippedCount: 0, failures: [] });
      expect(ctx.settlementQueue.chargeIds).toEqual(processed.body.data.chargeIds);

      const installment = await request(ctx.app).get(
        `/installments/${due.body.data.installments[0].installmentId}`
      );
      expect(installment.body.data.installment.status).toBe('processing');
      expect(installment.body.data.installment.chargeId).toBe(processed.body.data.chargeIds[0]);
    });

    it('should look ahead with asOf', async () => {
      await createOrder();

      const response = await request(ctx.app).get('/installments/due?asOf=2026-03-02T00:00:00.000Z');

      expect(response.body.data.installments).toHaveLength(2);
    });

    it('should not charge an installment twice on a second sweep', async () => {
      await createOrder();
      now = new Date('2026-02-01T00:00:00.000Z');

      await request(ctx.app).post('/installments/due/process');
      const second = await request(ctx.app).post('/installments/due/process');

      expect(second.body.data.processedCount).toBe(0);
      expect(ctx.settlementQueue.chargeIds).toHaveLength(1);
    });
  });

  describe('POST /installments/:installmentId/process', () => {
    it('should charge an installment ahead of its due date', async () => {
      const created = await createOrder();
      const installmentId: string = created.body.data.installments[2].installmentId;

      const response = await request(ctx.app).post(`/installments/${installmentId}/process`);

      expect(response.status).toBe(202);
      expect(response.body.data.installment.status).toBe('processing');
      expect(ctx.stores.charges.charges.get(response.body.data.chargeId)?.amount).toBe(33.34);
    });

    it('should refuse an installment that is already processing', async () => {
      const created = await createOrder();
      const installmentId: string = created.body.data.installments[0].installmentId;
      await request(ctx.app).post(`/installments/${installmentId}/process`);

      const response = await request(ctx.app).post(`/installments/${installmentId}/process`);

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_STATE_TRANSITION);
    });
  });
});
