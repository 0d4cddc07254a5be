/**
 * Webhook Transport
 *
 * POSTs a JSON payload to one destination and reports what happened.
 * Only HTTP 200 counts as delivered.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import crypto from 'crypto';

import { truncateResponseBody } from '../../stores/webhook-log.store';

export interface WebhookRequestMeta {
  logId: string;
  eventType: string;
}

export interface WebhookAttempt {
  delivered: boolean;
  statusCode: number | null;
  responseBody: string | null;
  error: string | null;
  durationMs: number;
}

export interface WebhookTransport {
  /**
   * Resolves for every outcome, including timeouts and refused connections
   */
  post(url: string, payload: Record<string, unknown>, meta: WebhookRequestMeta): Promise<WebhookAttempt>;
}

export interface AxiosWebhookTransportConfig {
  timeoutMs: number;
  signingSecret?: string;
  adapter?: AxiosAdapter;
}

/**
 * Sign a serialized body with HMAC-SHA256
 */
export function signPayload(body: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Truncate response body for storage
 */
export function truncateResponse(data: unknown): string {
  return truncateResponseBody(typeof data === 'string' ? data : JSON.stringify(data) ?? '');
}

export class AxiosWebhookTransport implements WebhookTransport {
  private client: AxiosInstance;
  private signingSecret?: string;

  constructor(config: AxiosWebhookTransportConfig) {
    this.signingSecret = config.signingSecret;
    this.client = axios.create({
      timeout: config.timeoutMs,
      adapter: config.adapter,
      // Every status is an answer; the caller decides what counts
      validateStatus: () => true,
    });
  }

  async post(
    url: string,
    payload: Record<string, unknown>,
    meta: WebhookRequestMeta
  ): Promise<WebhookAttempt> {
    const body = JSON.stringify(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Webhook-Event': meta.eventType,
      'X-Webhook-Log-Id': meta.logId,
    };
    if (this.signingSecret) {
      headers['X-Webhook-Signature'] = `sha256=${signPayload(body, this.signingSecret)}`;
    }

    const startedAt = Date.now();
    try {
      const response = await this.client.post<unknown>(url, body, { headers });
      const responseBody = truncateResponse(response.data);
      const delivered = response.status === 200;

      return {
        delivered,
        statusCode: response.status,
        responseBody,
        error: delivered ? null : `HTTP ${response.status}: ${responseBody}`,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      return {
        delivered: false,
        statusCode: null,
        responseBody: null,
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startedAt,
      };
    }
  }
}
