/**
 * Event and status vocabulary shared by stores, services and workers
 */

export enum WebhookEventType {
  CHARGE_SUCCEEDED = 'charge.succeeded',
  CHARGE_FAILED = 'charge.failed',
}

export enum ChargeStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
}

export enum PaymentMethod {
  WALLET = 'wallet',
  EXTERNAL = 'external',
}

export enum InstallmentStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  PAID = 'paid',
  FAILED = 'failed',
  OVERDUE = 'overdue',
}

export enum OrderStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum WebhookLogStatus {
  PENDING = 'pending',
  PROCESSED = 'processed',
  FAILED = 'failed',
}

export enum DeliveryStatus {
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
}

export enum LedgerEntryType {
  CREDIT = 'credit',
  DEBIT = 'debit',
}

/**
 * Wire shape of the charge notification, snake_case for subscribers.
 * A type alias so it can be stored as a plain record.
 */
export type ChargeWebhookPayload = {
  event_type: WebhookEventType;
  charge_id: string;
  customer_id: string;
  amount: number;
  currency: string;
  status: ChargeStatus;
  payment_method: PaymentMethod | null;
  external_charge_id: string | null;
  split_instructions: Record<string, unknown> | null;
  created_at: string;
  metadata: {
    installment_id: string | null;
    installment_order_id: string | null;
  };
};
