/**
 * HTTP payment processor client
 * Submits shortfall charges to the configured processor API
 */

import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';

import { createServiceLogger, Logger } from '../../observability';

import {
  PaymentProcessor,
  PaymentProcessorError,
  ProcessorChargeRequest,
  ProcessorChargeResponse,
} from './payment-processor.types';

export interface HttpPaymentProcessorConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Pull a human-readable message and code out of a processor error body.
 * Accepts `{ error: { message, code } }` and `{ message, code }`.
 */
export const extractProcessorError = (
  data: unknown
): { message: string | null; code: string | null } => {
  const source = isRecord(data) && isRecord(data.error) ? data.error : data;
  if (!isRecord(source)) {
    return { message: typeof data === 'string' && data.length > 0 ? data : null, code: null };
  }
  return {
    message: typeof source.message === 'string' ? source.message : null,
    code: typeof source.code === 'string' ? source.code : null,
  };
};

export class HttpPaymentProcessor implements PaymentProcessor {
  private client: AxiosInstance;
  private log: Logger;

  constructor(config: HttpPaymentProcessorConfig, log: Logger = createServiceLogger('payment-processor')) {
    this.log = log;

    if (!config.apiKey) {
      this.log.warn('Payment processor API key not configured');
    }

    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey}`,
      },
      adapter: config.adapter,
    });
  }

  async charge(request: ProcessorChargeRequest): Promise<ProcessorChargeResponse> {
    try {
      const response = await this.client.post<unknown>(
        '/charges',
        {
          amount: request.amountMinor,
          currency: request.currency,
          customer: request.customerReference,
          description: request.description,
          metadata: request.metadata,
        },
        {
          headers: { 'Idempotency-Key': request.idempotencyKey },
        }
      );

      const data = response.data;
      if (!isRecord(data) || typeof data.id !== 'string' || data.id.length === 0) {
        throw new PaymentProcessorError('Processor response did not include a charge id', {
          statusCode: response.status,
        });
      }

      this.log.info(
        { externalChargeId: data.id, amountMinor: request.amountMinor },
        'Processor charge created'
      );
      return { externalChargeId: data.id };
    } catch (error) {
      throw this.toProcessorError(error);
    }
  }

  private toProcessorError(error: unknown): PaymentProcessorError {
    if (error instanceof PaymentProcessorError) {
      return error;
    }

    if (error instanceof AxiosError) {
      const { response } = error;
      if (response) {
        const details = extractProcessorError(response.data);
        this.log.warn(
          { status: response.status, code: details.code },
          'Processor declined charge'
        );
        return new PaymentProcessorError(
          details.message ?? `Processor responded with HTTP ${response.status}`,
          { code: details.code, statusCode: response.status }
        );
      }

      this.log.error({ code: error.code, err: error.message }, 'Processor unreachable');
      return new PaymentProcessorError(error.message, { code: error.code ?? null });
    }

    return new PaymentProcessorError(error instanceof Error ? error.message : String(error));
  }
}
