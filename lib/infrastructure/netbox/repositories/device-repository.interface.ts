/**
 * Netbox Device Repository Interface
 */

import type { NetboxDevice } from "../types/api-responses";

export interface NetboxDeviceRepository {
  /**
   * Check the API is reachable and the token accepted
   */
  ping(): Promise<void>;

  /**
   * List every device matching the query-string filter (all pages)
   */
  getDevices(filter: string): Promise<NetboxDevice[]>;

  /**
   * List every virtual machine matching the query-string filter (all pages)
   */
  getVirtualMachines(filter: string): Promise<NetboxDevice[]>;
}
