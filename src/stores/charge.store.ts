import { FilterQuery } from 'mongoose';

import { Charge, ICharge } from '../models';
import { ChargeStatus, PaymentMethod } from '../types/events';
import { ChargeRecord, Page, PageResult } from '../types/records';
import { roundMoney } from '../utils/money';

export interface CreateChargeInput {
  customerId: string;
  amount: number;
  currency: string;
  installmentId?: string | null;
  orderId?: string | null;
  splitInstructions?: Record<string, unknown> | null;
}

export interface ChargeUpdate {
  status: ChargeStatus;
  paymentMethod?: PaymentMethod | null;
  externalChargeId?: string | null;
  walletAmount?: number;
  failureReason?: string | null;
}

export interface ChargeFilter {
  customerId?: string;
  status?: ChargeStatus;
  installmentId?: string;
  orderId?: string;
}

export interface ChargeStore {
  create(input: CreateChargeInput): Promise<ChargeRecord>;
  findById(chargeId: string): Promise<ChargeRecord | null>;
  list(filter: ChargeFilter, page: Page): Promise<PageResult<ChargeRecord>>;
  /**
   * Conditional update: applies only while the charge is in one of `from`.
   * Resolves null when the charge is missing or has moved on.
   */
  transition(chargeId: string, from: ChargeStatus[], update: ChargeUpdate): Promise<ChargeRecord | null>;
}

export const toChargeRecord = (doc: ICharge): ChargeRecord => ({
  chargeId: doc.chargeId,
  customerId: doc.customerId,
  amount: doc.amount,
  currency: doc.currency,
  status: doc.status,
  paymentMethod: doc.paymentMethod ?? null,
  externalChargeId: doc.externalChargeId ?? null,
  walletAmount: doc.walletAmount ?? 0,
  installmentId: doc.installmentId ?? null,
  orderId: doc.orderId ?? null,
  splitInstructions: doc.splitInstructions ?? null,
  failureReason: doc.failureReason ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const buildFilter = (filter: ChargeFilter): FilterQuery<ICharge> => {
  const query: FilterQuery<ICharge> = {};
  if (filter.customerId) query.customerId = filter.customerId;
  if (filter.status) query.status = filter.status;
  if (filter.installmentId) query.installmentId = filter.installmentId;
  if (filter.orderId) query.orderId = filter.orderId;
  return query;
};

export class MongoChargeStore implements ChargeStore {
  async create(input: CreateChargeInput): Promise<ChargeRecord> {
    const charge = await Charge.create({
      customerId: input.customerId,
      amount: roundMoney(input.amount),
      currency: input.currency,
      status: ChargeStatus.PENDING,
      installmentId: input.installmentId ?? undefined,
      orderId: input.orderId ?? undefined,
      splitInstructions: input.splitInstructions ?? undefined,
    });
    return toChargeRecord(charge);
  }

  async findById(chargeId: string): Promise<ChargeRecord | null> {
    const charge = await Charge.findOne({ chargeId });
    return charge ? toChargeRecord(charge) : null;
  }

  async list(filter: ChargeFilter, page: Page): Promise<PageResult<ChargeRecord>> {
    const query = buildFilter(filter);
    const [charges, total] = await Promise.all([
      Charge.find(query).sort({ createdAt: -1 }).skip(page.offset).limit(page.limit),
      Charge.countDocuments(query),
    ]);
    return { items: charges.map(toChargeRecord), total, ...page };
  }

  async transition(
    chargeId: string,
    from: ChargeStatus[],
    update: ChargeUpdate
  ): Promise<ChargeRecord | null> {
    const set: Record<string, unknown> = { status: update.status };
    if (update.paymentMethod !== undefined) set.paymentMethod = update.paymentMethod;
    if (update.externalChargeId !== undefined) set.externalChargeId = update.externalChargeId;
    if (update.walletAmount !== undefined) set.walletAmount = roundMoney(update.walletAmount);
    if (update.failureReason !== undefined) set.failureReason = update.failureReason;

    const charge = await Charge.findOneAndUpdate(
      { chargeId, status: { $in: from } },
      { $set: set },
      { new: true }
    );
    return charge ? toChargeRecord(charge) : null;
  }
}
