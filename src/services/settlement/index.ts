export { SettlementService, SettlementDependencies } from './settlement.service';
export {
  SettlementOutcome,
  SettlementResult,
  SettlementSucceeded,
  SettlementFailed,
  SettlementSkipped,
  SettlementError,
} from './settlement.types';
