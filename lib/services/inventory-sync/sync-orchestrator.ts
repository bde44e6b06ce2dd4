/**
 * Inventory Sync Orchestrator
 *
 * Runs one sync: ping both upstreams, fetch both inventories,
 * normalize, reconcile, then apply (unless in check mode).
 * Any fetch failure aborts the run before reconciliation.
 */

import type { UpstreamName } from "../../infrastructure/errors";
import type { NetboxDevice, NetboxDeviceRepository } from "../../infrastructure/netbox";
import type { NetshotDeviceRepository } from "../../infrastructure/netshot";
import type { Logger } from "../../utils/logger";
import { ActionApplier } from "./action-applier";
import { FetchError } from "./errors";
import { InventoryNormalizer } from "./normalizer";
import { InventoryReconciler } from "./reconciler";
import type { SyncOptions, SyncReport } from "./types";

export interface InventorySyncDependencies {
  netbox: NetboxDeviceRepository;
  netshot: NetshotDeviceRepository;
  logger: Logger;
}

export class InventorySyncOrchestrator {
  private readonly netbox: NetboxDeviceRepository;
  private readonly netshot: NetshotDeviceRepository;
  private readonly logger: Logger;
  private readonly normalizer: InventoryNormalizer;
  private readonly reconciler: InventoryReconciler;
  private readonly applier: ActionApplier;

  constructor(
    dependencies: InventorySyncDependencies,
    private readonly options: SyncOptions,
  ) {
    this.netbox = dependencies.netbox;
    this.netshot = dependencies.netshot;
    this.logger = dependencies.logger.child("Sync");
    this.normalizer = new InventoryNormalizer(dependencies.logger);
    this.reconciler = new InventoryReconciler(dependencies.logger);
    this.applier = new ActionApplier({
      target: dependencies.netshot,
      domainId: options.domainId,
      dryRun: options.dryRun,
      logger: dependencies.logger,
    });
  }

  async run(): Promise<SyncReport> {
    await this.fetchFrom("netbox", "reach the API", () => this.netbox.ping());
    await this.fetchFrom("netshot", "reach the API", () => this.netshot.ping());

    this.logger.info("Getting devices list from Netshot");
    const netshotDevices = await this.fetchFrom("netshot", "list devices", () => this.netshot.getDevices());

    this.logger.debug("Building netshot devices simplified inventory");
    const netshotInventory = this.normalizer.normalizeNetshotDevices(netshotDevices);

    this.logger.info("Getting devices list from Netbox");
    const netboxDevices = await this.fetchNetboxRecords();

    this.logger.debug("Building netbox devices simplified inventory");
    const netboxInventory = this.normalizer.normalizeNetboxDevices(netboxDevices);

    this.logger.debug(
      `Simplified inventories: Netbox(${netboxInventory.size}), Netshot(${netshotInventory.size})`,
    );

    this.logger.debug("Comparing inventories");
    const reconciliation = this.reconciler.reconcile(netboxInventory, netshotInventory);

    this.logger.info(`Found ${reconciliation.toRegister.size} devices missing on Netshot, to be added`);
    this.logger.info(`Found ${reconciliation.toDisable.size} devices missing on Netbox, to be disabled`);

    const applied = await this.applier.apply(reconciliation);

    return {
      netboxInventorySize: netboxInventory.size,
      netshotInventorySize: netshotInventory.size,
      reconciliation,
      applied,
    };
  }

  /**
   * Devices, followed by VMs when a VM filter is configured
   */
  private async fetchNetboxRecords(): Promise<NetboxDevice[]> {
    const devices = await this.fetchFrom("netbox", "list devices", () =>
      this.netbox.getDevices(this.options.devicesFilter),
    );

    const vmsFilter = this.options.vmsFilter;
    if (vmsFilter === undefined) {
      return devices;
    }

    this.logger.info("Getting VMs list from Netbox");
    const vms = await this.fetchFrom("netbox", "list virtual machines", () =>
      this.netbox.getVirtualMachines(vmsFilter),
    );

    this.logger.debug("Merging VMs and Devices lists");
    return [...devices, ...vms];
  }

  private async fetchFrom<T>(source: UpstreamName, operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new FetchError(source, operation, error);
    }
  }
}
