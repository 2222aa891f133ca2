export { createReturnReportService } from './services/returnReportService';
export type { ReturnReportService, ReturnReportServiceDeps } from './services/returnReportService';
export { createLogger } from './infrastructure/logger';
