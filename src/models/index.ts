export { Wallet, IWallet } from './Wallet';
export { WalletLedgerEntry, IWalletLedgerEntry } from './WalletLedgerEntry';
export { Charge, ICharge } from './Charge';
export { InstallmentOrder, IInstallmentOrder } from './InstallmentOrder';
export { Installment, IInstallment } from './Installment';
export { WebhookLog, IWebhookLog } from './WebhookLog';
export { WebhookDelivery, IWebhookDelivery, RESPONSE_BODY_LIMIT } from './WebhookDelivery';
