import request from 'supertest';

import { ErrorCode } from '../../src/types/errors';
import { createTestContext, TestContext } from '../helpers';

describe('Wallet Endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  const openWallet = (customerId = 'cust_1', currency?: string) =>
    request(ctx.app).post('/wallets').send({ customerId, currency });

  describe('POST /wallets', () => {
    it('should open an empty USD wallet by default', async () => {
      const response = await openWallet();

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.data.wallet.walletId).toMatch(/^wal_/);
      expect(response.body.data.wallet.customerId).toBe('cust_1');
      expect(response.body.data.wallet.balance).toBe(0);
      expect(response.body.data.wallet.currency).toBe('USD');
      expect(response.body.data.wallet.isActive).toBe(true);
    });

    it('should upper-case the currency', async () => {
      const response = await openWallet('cust_1', 'eur');

      expect(response.status).toBe(201);
      expect(response.body.data.wallet.currency).toBe('EUR');
    });

    it('should reject a second wallet for the same customer', async () => {
      await openWallet();

      const response = await openWallet();

      expect(response.status).toBe(409);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe(ErrorCode.WALLET_ALREADY_EXISTS);
    });

    it('should reject a missing customer ID', async () => {
      const response = await request(ctx.app).post('/wallets').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(response.body.error.details.customerId).toContain('Customer ID is required');
    });

    it('should reject a currency that is not three letters', async () => {
      const response = await openWallet('cust_1', 'DOLLARS');

      expect(response.status).toBe(400);
      expect(response.body.error.details.currency).toEqual(['Currency must be a 3-letter code']);
    });
  });

  describe('GET /wallets/:customerId', () => {
    it('should return the wallet', async () => {
      await openWallet();

      const response = await request(ctx.app).get('/wallets/cust_1');

      expect(response.status).toBe(200);
      expect(response.body.data.wallet.customerId).toBe('cust_1');
    });

    it('should return 404 for an unknown customer', async () => {
      const response = await request(ctx.app).get('/wallets/cust_unknown');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.WALLET_NOT_FOUND);
      expect(response.body.error.message).toBe('Wallet not found');
    });
  });

  describe('POST /wallets/:customerId/credit', () => {
    it('should credit the wallet and write a ledger entry', async () => {
      await openWallet();

      const response = await request(ctx.app)
        .post('/wallets/cust_1/credit')
        .send({ amount: 25.5, description: 'Refund from store' });

      expect(response.status).toBe(200);
      expect(response.body.data.wallet.balance).toBe(25.5);
      expect(response.body.data.entry).toMatchObject({
        type: 'credit',
        amount: 25.5,
        description: 'Refund from store',
        balanceBefore: 0,
        balanceAfter: 25.5,
      });
    });

    it('should accumulate credits in cents', async () => {
      await openWallet();
      await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 0.1 });

      const response = await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 0.2 });

      expect(response.body.data.wallet.balance).toBe(0.3);
    });

    it('should reject more than two decimal places', async () => {
      await openWallet();

      const response = await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 1.005 });

      expect(response.status).toBe(400);
      expect(response.body.error.details.amount).toEqual(['amount can have at most 2 decimal places']);
    });

    it('should reject a non-positive amount', async () => {
      await openWallet();

      const response = await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 0 });

      expect(response.status).toBe(400);
      expect(response.body.error.details.amount).toContain(
        'amount must be a positive number greater than 0'
      );
    });

    it('should refuse to credit an inactive wallet', async () => {
      const opened = await openWallet();
      ctx.stores.wallets.patch(opened.body.data.wallet.walletId, { isActive: false });

      const response = await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 10 });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(ErrorCode.WALLET_INACTIVE);
    });
  });

  describe('GET /wallets/:customerId/ledger', () => {
    it('should list entries newest first', async () => {
      await openWallet();
      await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 10 });
      await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 20 });

      const response = await request(ctx.app).get('/wallets/cust_1/ledger');

      expect(response.status).toBe(200);
      expect(response.body.data.entries.map((entry: { amount: number }) => entry.amount)).toEqual([
        20, 10,
      ]);
      expect(response.body.data.pagination).toEqual({ total: 2, limit: 20, offset: 0 });
    });

    it('should reject a limit above the maximum', async () => {
      await openWallet();

      const response = await request(ctx.app).get('/wallets/cust_1/ledger?limit=101');

      expect(response.status).toBe(400);
      expect(response.body.error.details.limit).toEqual(['Limit must be between 1 and 100']);
    });
  });

  describe('GET /wallets/:customerId/reconciliation', () => {
    it('should report a balance that matches the ledger', async () => {
      const opened = await openWallet();
      await request(ctx.app).post('/wallets/cust_1/credit').send({ amount: 42 });

      const response = await request(ctx.app).get('/wallets/cust_1/reconciliation');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        walletId: opened.body.data.wallet.walletId,
        customerId: 'cust_1',
        balance: 42,
        ledgerSum: 42,
        consistent: true,
      });
    });

    it('should flag a balance changed outside the ledger', async () => {
      const opened = await openWallet();
      ctx.stores.wallets.patch(opened.body.data.wallet.walletId, { balance: 5 });

      const response = await request(ctx.app).get('/wallets/cust_1/reconciliation');

      expect(response.body.data.consistent).toBe(false);
      expect(response.body.data.ledgerSum).toBe(0);
    });
  });
});
