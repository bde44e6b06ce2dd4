/**
 * Netshot Device Repository Interface
 */

import type { NetshotDevice, NetshotTask } from "../types/api-responses";

export interface NetshotDeviceRepository {
  /**
   * Check the API is reachable and the token accepted
   */
  ping(): Promise<void>;

  /**
   * List every device known to Netshot
   */
  getDevices(): Promise<NetshotDevice[]>;

  /**
   * Start a discovery task registering the device at `ip` in the given domain
   */
  registerDevice(ip: string, domainId: number): Promise<NetshotTask>;

  /**
   * Disable every device whose management address is `ip`
   */
  disableDevice(ip: string): Promise<void>;
}
