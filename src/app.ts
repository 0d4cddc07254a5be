import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { errorHandler, notFoundHandler } from './middlewares';
import { createHealthRoutes, HealthProbe } from './routes/health';
import { ChargeController, ChargeService, createChargeRoutes } from './services/charge';
import {
  createInstallmentRoutes,
  InstallmentController,
  InstallmentService,
} from './services/installment';
import { createWalletRoutes, WalletController, WalletService } from './services/wallet';
import { createWebhookRoutes, WebhookController, WebhookService } from './services/webhook';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export interface AppDependencies {
  walletService: WalletService;
  chargeService: ChargeService;
  installmentService: InstallmentService;
  webhookService: WebhookService;
  health: HealthProbe;
}

export const createApp = (deps: AppDependencies): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  const maxPageLimit = config.api.maxPageLimit;

  // Routes
  app.use('/health', createHealthRoutes(deps.health));
  app.use(
    '/wallets',
    createWalletRoutes(new WalletController(deps.walletService, maxPageLimit), maxPageLimit)
  );
  app.use(
    '/charges',
    createChargeRoutes(new ChargeController(deps.chargeService, maxPageLimit), maxPageLimit)
  );
  app.use(
    '/installments',
    createInstallmentRoutes(
      new InstallmentController(deps.installmentService, maxPageLimit),
      maxPageLimit
    )
  );
  app.use(
    '/webhooks',
    createWebhookRoutes(
      new WebhookController(deps.webhookService, config.webhook.maxPageLimit),
      config.webhook.maxPageLimit
    )
  );

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Installment Settlement API',
      version: '1.0.0',
      description: 'Installment scheduling with wallet-first charge settlement',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
