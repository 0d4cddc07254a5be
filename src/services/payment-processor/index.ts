export {
  PaymentProcessor,
  PaymentProcessorError,
  ProcessorChargeRequest,
  ProcessorChargeResponse,
} from './payment-processor.types';
export {
  HttpPaymentProcessor,
  HttpPaymentProcessorConfig,
  extractProcessorError,
} from './payment-processor.client';
