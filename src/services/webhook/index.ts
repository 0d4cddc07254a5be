export {
  WebhookService,
  WebhookServiceDependencies,
  DispatchResult,
  WebhookLogDetail,
  buildChargeWebhookPayload,
} from './webhook.service';
export {
  WebhookTransport,
  WebhookAttempt,
  WebhookRequestMeta,
  AxiosWebhookTransport,
  AxiosWebhookTransportConfig,
  signPayload,
  truncateResponse,
} from './webhook.transport';
export { WebhookController } from './webhook.controller';
export { createWebhookRoutes } from './webhook.routes';
