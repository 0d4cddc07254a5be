/**
 * Composition root
 *
 * Builds the Mongo stores, outbound clients, queue producers and services
 * from configuration. The HTTP server and the worker process both start from
 * here; tests assemble the same services around in-memory stores.
 */

import { config, AppConfig } from './config';
import { getDatabaseStatus } from './config/database';
import { isRedisConnected } from './config/redis';
import { bullNotificationQueue, bullSettlementQueue } from './queues';
import { HealthProbe } from './routes/health';
import { ChargeService } from './services/charge';
import { InstallmentService } from './services/installment';
import { HttpPaymentProcessor } from './services/payment-processor';
import { SettlementService } from './services/settlement';
import { WalletService } from './services/wallet';
import { AxiosWebhookTransport, WebhookService } from './services/webhook';
import {
  MongoChargeStore,
  MongoInstallmentStore,
  MongoWalletStore,
  MongoWebhookLogStore,
} from './stores';

export interface Container {
  walletService: WalletService;
  chargeService: ChargeService;
  installmentService: InstallmentService;
  settlementService: SettlementService;
  webhookService: WebhookService;
  health: HealthProbe;
}

export const buildContainer = (appConfig: AppConfig = config): Container => {
  const wallets = new MongoWalletStore();
  const charges = new MongoChargeStore();
  const installments = new MongoInstallmentStore();
  const webhookLogs = new MongoWebhookLogStore();

  const processor = new HttpPaymentProcessor({
    baseUrl: appConfig.paymentProcessor.baseUrl,
    apiKey: appConfig.paymentProcessor.apiKey,
    timeoutMs: appConfig.paymentProcessor.timeoutMs,
  });

  const transport = new AxiosWebhookTransport({
    timeoutMs: appConfig.webhook.timeoutMs,
    signingSecret: appConfig.webhook.signingSecret,
  });

  return {
    walletService: new WalletService(wallets),
    chargeService: new ChargeService(charges, bullSettlementQueue),
    installmentService: new InstallmentService({
      installments,
      charges,
      settlementQueue: bullSettlementQueue,
    }),
    settlementService: new SettlementService({
      charges,
      wallets,
      installments,
      processor,
      notifications: bullNotificationQueue,
    }),
    webhookService: new WebhookService({
      charges,
      logs: webhookLogs,
      transport,
      urls: appConfig.webhook.urls,
    }),
    health: {
      database: getDatabaseStatus,
      redis: isRedisConnected,
    },
  };
};
