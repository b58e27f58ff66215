export { ReconciliationEngine } from './reconciliation.service';
export {
  IngestionGateway,
  transactionInputSchema,
  type TransactionInput,
  type IngestionResult,
  type BatchIngestionResult,
  type BatchIngestionFailure,
} from './ingestion.service';
export { TransactionService, type ReconciliationSummary, type StatusCounts } from './transaction.service';
export { HealthService, type ReadinessChecks } from './health.service';
