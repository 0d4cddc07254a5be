import {
  ChargeStatus,
  DeliveryStatus,
  InstallmentStatus,
  LedgerEntryType,
  OrderStatus,
  PaymentMethod,
  WebhookEventType,
  WebhookLogStatus,
} from './events';

/**
 * Plain records returned by the stores. Services never see Mongoose documents.
 */

export interface WalletRecord {
  walletId: string;
  customerId: string;
  balance: number;
  currency: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface LedgerEntryRecord {
  entryId: string;
  walletId: string;
  type: LedgerEntryType;
  amount: number;
  description: string;
  referenceId: string | null;
  balanceBefore: number;
  balanceAfter: number;
  createdAt: Date;
}

export interface ChargeRecord {
  chargeId: string;
  customerId: string;
  amount: number;
  currency: string;
  status: ChargeStatus;
  paymentMethod: PaymentMethod | null;
  externalChargeId: string | null;
  walletAmount: number;
  installmentId: string | null;
  orderId: string | null;
  splitInstructions: Record<string, unknown> | null;
  failureReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface InstallmentOrderRecord {
  orderId: string;
  customerId: string;
  totalAmount: number;
  currency: string;
  installmentCount: number;
  installmentAmount: number;
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface InstallmentRecord {
  installmentId: string;
  orderId: string;
  sequenceNumber: number;
  amount: number;
  dueDate: Date;
  status: InstallmentStatus;
  chargeId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface WebhookLogRecord {
  logId: string;
  eventType: WebhookEventType;
  payload: Record<string, unknown>;
  status: WebhookLogStatus;
  processedAt: Date | null;
  errorMessage: string | null;
  createdAt: Date;
}

export interface WebhookDeliveryRecord {
  deliveryId: string;
  logId: string;
  url: string;
  status: DeliveryStatus;
  responseCode: number | null;
  responseBody: string | null;
  error: string | null;
  durationMs: number;
  createdAt: Date;
}

/**
 * Offset pagination shared by list endpoints
 */
export interface Page {
  limit: number;
  offset: number;
}

export interface PageResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}
