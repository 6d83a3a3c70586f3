export { OrderManager } from './OrderManager';
export type { OrderManagerConfig, PermissionCheck, StockImport } from './OrderManager';
export { MemoryOrderStorage, laterOf } from './MemoryOrderStorage';
export { MongoOrderStorage } from './MongoOrderStorage';
export type { MongoOrderStorageConfig } from './MongoOrderStorage';
export type {
  LastUpdatedMarkers,
  OrderStorage,
  OrderStorageCommit,
  OrderWrite,
} from './OrderStorage';
export { OrderSearchIndex, orderDocumentText, stockDocumentText } from './OrderSearchIndex';
export type { OrderIndexEntry, OrderSearchHit, StockIndexEntry } from './OrderSearchIndex';
export { StockLedger, findVariant, stockStatusFor, totalInventory } from './StockLedger';
export type { StockAdjustment, StockWrite } from './StockLedger';
export {
  ORDER_TRANSITIONS,
  MODIFIABLE_STATUSES,
  CANCELLABLE_STATUSES,
  canTransition,
  isCancellable,
  isModifiable,
} from './stateMachine';
export { ok, fail, reject, rejection } from './results';
