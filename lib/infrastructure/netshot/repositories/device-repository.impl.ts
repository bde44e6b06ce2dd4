/**
 * Netshot Device Repository
 *
 * Lists, registers and disables devices through the Netshot REST API
 */

import { z } from "zod";
import type { NetshotHttpClient } from "../client/http-client";
import {
  NETSHOT_DISABLED_STATUS,
  NetshotDeviceListSchema,
  NetshotDeviceSearchResultSchema,
  NetshotServerInfoSchema,
  NetshotTaskSchema,
  type NetshotDevice,
  type NetshotDeviceUpdate,
  type NetshotNewDevice,
  type NetshotTask,
} from "../types/api-responses";
import { UpstreamNotFoundError } from "../../errors";
import type { NetshotDeviceRepository } from "./device-repository.interface";
import type { Logger } from "../../../utils/logger";

const DEVICES_PATH = "/api/devices";
const SEARCH_PATH = "/api/devices/search";
const SERVER_INFO_PATH = "/api/server/info";

export const DEFAULT_NETSHOT_PAGE_SIZE = 1000;

export class NetshotDeviceRepositoryImpl implements NetshotDeviceRepository {
  private readonly logger: Logger;

  constructor(
    private readonly client: NetshotHttpClient,
    logger: Logger,
    private readonly pageSize: number = DEFAULT_NETSHOT_PAGE_SIZE,
  ) {
    this.logger = logger.child("Netshot");
  }

  async ping(): Promise<void> {
    const info = await this.client.get(SERVER_INFO_PATH, NetshotServerInfoSchema);
    this.logger.debug(`Connected to Netshot ${info.serverVersion ?? "(unknown version)"}`);
  }

  /**
   * List all devices, one page at a time until a short page comes back.
   * Servers that ignore offset/limit answer the full list on every call:
   * an oversized page, or a page bringing no new device, ends the listing.
   */
  async getDevices(): Promise<NetshotDevice[]> {
    const devices: NetshotDevice[] = [];
    const seen = new Set<number>();
    let offset = 0;

    for (;;) {
      const params = new URLSearchParams({
        offset: String(offset),
        limit: String(this.pageSize),
      });
      const page = await this.client.get(DEVICES_PATH, NetshotDeviceListSchema, { params });
      const fresh = page.filter((device) => !seen.has(device.id));
      for (const device of fresh) {
        seen.add(device.id);
        devices.push(device);
      }

      if (page.length !== this.pageSize || fresh.length === 0) {
        break;
      }
      offset += page.length;
    }

    this.logger.debug(`Fetched ${devices.length} device(s) from Netshot`);
    return devices;
  }

  async registerDevice(ip: string, domainId: number): Promise<NetshotTask> {
    const body: NetshotNewDevice = {
      autoDiscover: true,
      ipAddress: ip,
      domainId,
    };

    const task = await this.client.post(DEVICES_PATH, body, NetshotTaskSchema);
    this.logger.info(`Registered ${ip} in domain ${domainId} (discovery task ${task.id})`);
    return task;
  }

  async disableDevice(ip: string): Promise<void> {
    const devices = await this.findByIp(ip);
    if (devices.length === 0) {
      throw new UpstreamNotFoundError("Netshot device", ip, "netshot", SEARCH_PATH);
    }

    for (const device of devices) {
      if (device.status === NETSHOT_DISABLED_STATUS) {
        this.logger.debug(`${device.name}(${ip}) is already disabled`);
        continue;
      }

      const body: NetshotDeviceUpdate = { enabled: false };
      await this.client.put(`${DEVICES_PATH}/${device.id}`, body, z.unknown());
      this.logger.info(`Disabled ${device.name}(${ip})`);
    }
  }

  private async findByIp(ip: string): Promise<NetshotDevice[]> {
    const result = await this.client.post(
      SEARCH_PATH,
      { query: `[IP] IS ${ip}` },
      NetshotDeviceSearchResultSchema,
    );

    // The search matches on any interface address; keep management address matches only
    return result.devices.filter((device) => device.mgmtAddress.ip === ip);
  }
}
