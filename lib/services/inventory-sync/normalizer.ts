/**
 * Inventory Normalizer
 *
 * Turns raw Netbox and Netshot records into IP-keyed inventories.
 * Each source keeps its own extraction rules.
 */

import type { NetboxDevice } from "../../infrastructure/netbox";
import type { NetshotDevice } from "../../infrastructure/netshot";
import type { Logger } from "../../utils/logger";
import type { CanonicalEntry, Inventory } from "./types";

/**
 * "10.0.0.1/24" → "10.0.0.1", "2001:db8::1/64" → "2001:db8::1"
 */
export function stripCidrSuffix(address: string): string {
  return address.split("/")[0].trim();
}

export function netboxDeviceLabel(device: NetboxDevice): string {
  return device.name ?? String(device.id);
}

export class InventoryNormalizer {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child("Normalizer");
  }

  /**
   * Devices (and VMs) without a primary IPv4 are skipped with a warning
   */
  normalizeNetboxDevices(devices: readonly NetboxDevice[]): Inventory {
    const inventory: Inventory = new Map();

    for (const device of devices) {
      const label = netboxDeviceLabel(device);
      const ip = device.primary_ip4 ? stripCidrSuffix(device.primary_ip4.address) : "";

      if (!ip) {
        this.logger.warn(`Device ${label} is missing its primary IP address, skipping it`);
        continue;
      }

      this.insert(inventory, { ip, label }, "Netbox");
    }

    return inventory;
  }

  /**
   * Devices without a management address are skipped with a warning
   */
  normalizeNetshotDevices(devices: readonly NetshotDevice[]): Inventory {
    const inventory: Inventory = new Map();

    for (const device of devices) {
      const ip = device.mgmtAddress.ip.trim();

      if (!ip) {
        this.logger.warn(`Device ${device.name} has no management IP address, skipping it`);
        continue;
      }

      this.insert(inventory, { ip, label: device.name }, "Netshot");
    }

    return inventory;
  }

  // Last write wins on duplicate IPs
  private insert(inventory: Inventory, entry: CanonicalEntry, source: string): void {
    const previous = inventory.get(entry.ip);
    if (previous !== undefined) {
      this.logger.debug(`${source}: ${entry.label}(${entry.ip}) replaces ${previous} sharing the same IP`);
    }
    inventory.set(entry.ip, entry.label);
  }
}
