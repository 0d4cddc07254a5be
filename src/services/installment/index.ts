export {
  InstallmentService,
  InstallmentServiceDependencies,
  CreateOrderInput,
  ProcessDueResult,
  InstallmentFailure,
} from './installment.service';
export {
  buildInstallmentSchedule,
  validateScheduleInput,
  dueDateFor,
  InstallmentSchedule,
  ScheduleInput,
  MIN_INSTALLMENTS,
  MAX_INSTALLMENTS,
  INSTALLMENT_INTERVAL_DAYS,
} from './installment.schedule';
export { InstallmentController } from './installment.controller';
export { createInstallmentRoutes } from './installment.routes';
