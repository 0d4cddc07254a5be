import mongoose, { FilterQuery } from 'mongoose';

import { IInstallment, IInstallmentOrder, Installment, InstallmentOrder } from '../models';
import { InstallmentStatus, OrderStatus } from '../types/events';
import {
  InstallmentOrderRecord,
  InstallmentRecord,
  Page,
  PageResult,
} from '../types/records';

export interface NewOrder {
  customerId: string;
  totalAmount: number;
  currency: string;
  installmentCount: number;
  installmentAmount: number;
  createdAt: Date;
}

export interface NewInstallment {
  sequenceNumber: number;
  amount: number;
  dueDate: Date;
}

export interface OrderWithInstallments {
  order: InstallmentOrderRecord;
  installments: InstallmentRecord[];
}

export interface OrderFilter {
  customerId?: string;
  status?: OrderStatus;
}

export interface InstallmentStore {
  /**
   * Writes the order and all of its installments together
   */
  createOrder(order: NewOrder, installments: NewInstallment[]): Promise<OrderWithInstallments>;
  findOrderById(orderId: string): Promise<InstallmentOrderRecord | null>;
  listOrders(filter: OrderFilter, page: Page): Promise<PageResult<InstallmentOrderRecord>>;
  updateOrderStatus(
    orderId: string,
    from: OrderStatus[],
    to: OrderStatus
  ): Promise<InstallmentOrderRecord | null>;
  findInstallmentById(installmentId: string): Promise<InstallmentRecord | null>;
  listInstallmentsByOrder(orderId: string): Promise<InstallmentRecord[]>;
  /**
   * Pending installments due at or before `now`, oldest first
   */
  findDueInstallments(now: Date, limit?: number): Promise<InstallmentRecord[]>;
  /**
   * Conditional status update. Resolves null when the installment is missing
   * or no longer in one of `from`, which is how a claim is lost.
   */
  transitionInstallment(
    installmentId: string,
    from: InstallmentStatus[],
    to: InstallmentStatus
  ): Promise<InstallmentRecord | null>;
  attachCharge(installmentId: string, chargeId: string): Promise<InstallmentRecord | null>;
}

export const toOrderRecord = (doc: IInstallmentOrder): InstallmentOrderRecord => ({
  orderId: doc.orderId,
  customerId: doc.customerId,
  totalAmount: doc.totalAmount,
  currency: doc.currency,
  installmentCount: doc.installmentCount,
  installmentAmount: doc.installmentAmount,
  status: doc.status,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const toInstallmentRecord = (doc: IInstallment): InstallmentRecord => ({
  installmentId: doc.installmentId,
  orderId: doc.orderId,
  sequenceNumber: doc.sequenceNumber,
  amount: doc.amount,
  dueDate: doc.dueDate,
  status: doc.status,
  chargeId: doc.chargeId ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoInstallmentStore implements InstallmentStore {
  async createOrder(
    order: NewOrder,
    installments: NewInstallment[]
  ): Promise<OrderWithInstallments> {
    const session = await mongoose.startSession();
    const outcome: { result?: OrderWithInstallments } = {};

    try {
      await session.withTransaction(async () => {
        const [orderDoc] = await InstallmentOrder.create(
          [{ ...order, status: OrderStatus.PENDING }],
          { session }
        );
        const installmentDocs = await Installment.create(
          installments.map((installment) => ({
            ...installment,
            orderId: orderDoc.orderId,
            status: InstallmentStatus.PENDING,
          })),
          { session, ordered: true }
        );
        outcome.result = {
          order: toOrderRecord(orderDoc),
          installments: installmentDocs.map(toInstallmentRecord),
        };
      });
    } finally {
      await session.endSession();
    }

    if (!outcome.result) {
      throw new Error('Order transaction did not complete');
    }
    return outcome.result;
  }

  async findOrderById(orderId: string): Promise<InstallmentOrderRecord | null> {
    const order = await InstallmentOrder.findOne({ orderId });
    return order ? toOrderRecord(order) : null;
  }

  async listOrders(
    filter: OrderFilter,
    page: Page
  ): Promise<PageResult<InstallmentOrderRecord>> {
    const query: FilterQuery<IInstallmentOrder> = {};
    if (filter.customerId) query.customerId = filter.customerId;
    if (filter.status) query.status = filter.status;

    const [orders, total] = await Promise.all([
      InstallmentOrder.find(query).sort({ createdAt: -1 }).skip(page.offset).limit(page.limit),
      InstallmentOrder.countDocuments(query),
    ]);
    return { items: orders.map(toOrderRecord), total, ...page };
  }

  async updateOrderStatus(
    orderId: string,
    from: OrderStatus[],
    to: OrderStatus
  ): Promise<InstallmentOrderRecord | null> {
    const order = await InstallmentOrder.findOneAndUpdate(
      { orderId, status: { $in: from } },
      { $set: { status: to } },
      { new: true }
    );
    return order ? toOrderRecord(order) : null;
  }

  async findInstallmentById(installmentId: string): Promise<InstallmentRecord | null> {
    const installment = await Installment.findOne({ installmentId });
    return installment ? toInstallmentRecord(installment) : null;
  }

  async listInstallmentsByOrder(orderId: string): Promise<InstallmentRecord[]> {
    const installments = await Installment.find({ orderId }).sort({ sequenceNumber: 1 });
    return installments.map(toInstallmentRecord);
  }

  async findDueInstallments(now: Date, limit = 500): Promise<InstallmentRecord[]> {
    const installments = await Installment.find({
      status: InstallmentStatus.PENDING,
      dueDate: { $lte: now },
    })
      .sort({ dueDate: 1, sequenceNumber: 1 })
      .limit(limit);
    return installments.map(toInstallmentRecord);
  }

  async transitionInstallment(
    installmentId: string,
    from: InstallmentStatus[],
    to: InstallmentStatus
  ): Promise<InstallmentRecord | null> {
    const installment = await Installment.findOneAndUpdate(
      { installmentId, status: { $in: from } },
      { $set: { status: to } },
      { new: true }
    );
    return installment ? toInstallmentRecord(installment) : null;
  }

  async attachCharge(installmentId: string, chargeId: string): Promise<InstallmentRecord | null> {
    const installment = await Installment.findOneAndUpdate(
      { installmentId },
      { $set: { chargeId } },
      { new: true }
    );
    return installment ? toInstallmentRecord(installment) : null;
  }
}
