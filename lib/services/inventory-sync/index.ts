export { InventorySyncOrchestrator } from "./sync-orchestrator";
export type { InventorySyncDependencies } from "./sync-orchestrator";
export { InventoryNormalizer, stripCidrSuffix, netboxDeviceLabel } from "./normalizer";
export { InventoryReconciler } from "./reconciler";
export { ActionApplier } from "./action-applier";
export type { ActionApplierOptions, DeviceActionTarget } from "./action-applier";
export { FetchError, ActionError } from "./errors";
export type {
  ApplyResult,
  CanonicalEntry,
  DeviceAction,
  Inventory,
  ReconciliationResult,
  SyncOptions,
  SyncReport,
} from "./types";
