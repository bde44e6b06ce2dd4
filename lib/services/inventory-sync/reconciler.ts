/**
 * Inventory Reconciler
 *
 * Computes both one-sided differences between the Netbox and Netshot inventories.
 * Inputs are never mutated.
 */

import type { Logger } from "../../utils/logger";
import type { ReconciliationResult } from "./types";

export class InventoryReconciler {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child("Reconciler");
  }

  reconcile(netbox: ReadonlyMap<string, string>, netshot: ReadonlyMap<string, string>): ReconciliationResult {
    const toRegister = new Set<string>();
    const toDisable = new Set<string>();
    const matched = new Set<string>();

    for (const [ip, hostname] of netbox) {
      const existing = netshot.get(ip);
      if (existing !== undefined) {
        this.logger.debug(`${existing}(${ip}) is present on both`);
        matched.add(ip);
      } else {
        this.logger.debug(`${hostname}(${ip}) missing from Netshot`);
        toRegister.add(ip);
      }
    }

    for (const [ip, hostname] of netshot) {
      if (!netbox.has(ip)) {
        this.logger.debug(`${hostname}(${ip}) missing from Netbox`);
        toDisable.add(ip);
      }
    }

    return { toRegister, toDisable, matched };
  }
}

