/**
 * Inventory Sync Types
 */

import type { ActionError } from "./errors";

/**
 * Bare IP address → display name
 */
export type Inventory = Map<string, string>;

export interface CanonicalEntry {
  ip: string;
  label: string;
}

export interface ReconciliationResult {
  /** In Netbox, missing from Netshot */
  toRegister: Set<string>;
  /** In Netshot, missing from Netbox */
  toDisable: Set<string>;
  /** In both, no action */
  matched: Set<string>;
}

export type DeviceAction = "register" | "disable";

export interface ApplyResult {
  skipped: boolean;
  registered: string[];
  disabled: string[];
  failures: ActionError[];
}

export interface SyncOptions {
  devicesFilter: string;
  vmsFilter?: string;
  domainId: number;
  dryRun: boolean;
}

export interface SyncReport {
  netboxInventorySize: number;
  netshotInventorySize: number;
  reconciliation: ReconciliationResult;
  applied: ApplyResult;
}
