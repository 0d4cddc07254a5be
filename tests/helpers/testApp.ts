import { Application } from 'express';

import { createApp } from '../../src/app';
import { HealthProbe } from '../../src/routes/health';
import { ChargeService } from '../../src/services/charge';
import { InstallmentService } from '../../src/services/installment';
import { SettlementService } from '../../src/services/settlement';
import { WalletService } from '../../src/services/wallet';
import { WebhookService } from '../../src/services/webhook';

import {
  FakePaymentProcessor,
  FakeWebhookTransport,
  RecordingNotificationQueue,
  RecordingSettlementQueue,
} from './fakes';
import {
  InMemoryChargeStore,
  InMemoryInstallmentStore,
  InMemoryWalletStore,
  InMemoryWebhookLogStore,
} from './inMemoryStores';

export const TEST_WEBHOOK_URL = 'http://hooks.test/charges';

export interface TestContext {
  app: Application;
  stores: {
    wallets: InMemoryWalletStore;
    charges: InMemoryChargeStore;
    installments: InMemoryInstallmentStore;
    webhookLogs: InMemoryWebhookLogStore;
  };
  processor: FakePaymentProcessor;
  transport: FakeWebhookTransport;
  settlementQueue: RecordingSettlementQueue;
  notificationQueue: RecordingNotificationQueue;
  health: { database: boolean; redis: boolean };
  services: {
    walletService: WalletService;
    chargeService: ChargeService;
    installmentService: InstallmentService;
    settlementService: SettlementService;
    webhookService: WebhookService;
  };
}

export interface TestContextOptions {
  webhookUrls?: string[];
  clock?: () => Date;
}

/**
 * Full app wired to in-memory stores and recording fakes
 */
export const createTestContext = (options: TestContextOptions = {}): TestContext => {
  const wallets = new InMemoryWalletStore();
  const charges = new InMemoryChargeStore();
  const installments = new InMemoryInstallmentStore();
  const webhookLogs = new InMemoryWebhookLogStore();
  const processor = new FakePaymentProcessor();
  const transport = new FakeWebhookTransport();
  const settlementQueue = new RecordingSettlementQueue();
  const notificationQueue = new RecordingNotificationQueue();
  const health = { database: true, redis: true };

  const services = {
    walletService: new WalletService(wallets),
    chargeService: new ChargeService(charges, settlementQueue),
    installmentService: new InstallmentService({
      installments,
      charges,
      settlementQueue,
      clock: options.clock,
    }),
    settlementService: new SettlementService({
      charges,
      wallets,
      installments,
      processor,
      notifications: notificationQueue,
    }),
    webhookService: new WebhookService({
      charges,
      logs: webhookLogs,
      transport,
      urls: options.webhookUrls ?? [TEST_WEBHOOK_URL],
    }),
  };

  const probe: HealthProbe = {
    database: () => ({ connected: health.database, readyState: health.database ? 1 : 0 }),
    redis: () => health.redis,
  };

  const app = createApp({ ...services, health: probe });

  return {
    app,
    stores: { wallets, charges, installments, webhookLogs },
    processor,
    transport,
    settlementQueue,
    notificationQueue,
    health,
    services,
  };
};
