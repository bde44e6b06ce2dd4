/**
 * Netbox Device Repository
 *
 * Reads devices and virtual machines from the DCIM and virtualization endpoints
 */

import type { NetboxHttpClient } from "../client/http-client";
import {
  NetboxDeviceListSchema,
  NetboxStatusSchema,
  type NetboxDevice,
} from "../types/api-responses";
import type { NetboxDeviceRepository } from "./device-repository.interface";
import type { Logger } from "../../../utils/logger";

const DEVICES_PATH = "/api/dcim/devices/";
const VIRTUAL_MACHINES_PATH = "/api/virtualization/virtual-machines/";
const STATUS_PATH = "/api/status/";

export const DEFAULT_NETBOX_PAGE_SIZE = 1000;

export class NetboxDeviceRepositoryImpl implements NetboxDeviceRepository {
  private readonly logger: Logger;

  constructor(
    private readonly client: NetboxHttpClient,
    logger: Logger,
    private readonly pageSize: number = DEFAULT_NETBOX_PAGE_SIZE,
  ) {
    this.logger = logger.child("Netbox");
  }

  async ping(): Promise<void> {
    const status = await this.client.get(STATUS_PATH, NetboxStatusSchema);
    this.logger.debug(`Connected to Netbox ${status["netbox-version"] ?? "(unknown version)"}`);
  }

  async getDevices(filter: string): Promise<NetboxDevice[]> {
    const devices = await this.listAll(DEVICES_PATH, filter);
    this.logger.debug(`Fetched ${devices.length} device(s) from Netbox`);
    return devices;
  }

  async getVirtualMachines(filter: string): Promise<NetboxDevice[]> {
    const vms = await this.listAll(VIRTUAL_MACHINES_PATH, filter);
    this.logger.debug(`Fetched ${vms.length} virtual machine(s) from Netbox`);
    return vms;
  }

  /**
   * Walk the offset pagination until Netbox reports no next page
   */
  private async listAll(path: string, filter: string): Promise<NetboxDevice[]> {
    const records: NetboxDevice[] = [];
    let offset = 0;

    for (;;) {
      const params = new URLSearchParams(filter.replace(/^[?&]+/, ""));
      params.set("limit", String(this.pageSize));
      params.set("offset", String(offset));

      const page = await this.client.get(path, NetboxDeviceListSchema, { params });
      records.push(...page.results);

      if (!page.next || page.results.length === 0) {
        return records;
      }

      offset += page.results.length;
    }
  }
}
