export { ChargeService, NewChargeInput, SetChargeStatusOptions } from './charge.service';
export { ChargeController } from './charge.controller';
export { createChargeRoutes } from './charge.routes';
export {
  isValidTransition,
  validateTransition,
  isTerminalState,
  getSourceStates,
} from './charge.state';
