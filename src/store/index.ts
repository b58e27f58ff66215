export { SqliteTransactionStore } from './sqliteTransactionStore';
export type {
  TransactionStore,
  TransactionFilter,
  NewTransaction,
  TransactionTransition,
  PairUpdate,
  PairUpdateSide,
  PairUpdateResult,
} from './transactionStore';
