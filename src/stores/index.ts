export * from './wallet.store';
export * from './charge.store';
export * from './installment.store';
export * from './webhook-log.store';
