export { WalletService, CreditResult, ReconciliationReport } from './wallet.service';
export { WalletController } from './wallet.controller';
export { createWalletRoutes } from './wallet.routes';
