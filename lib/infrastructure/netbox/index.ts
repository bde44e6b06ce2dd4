/**
 * Netbox Infrastructure Module
 *
 * Read access to the Netbox source-of-truth inventory
 */

export { NetboxHttpClient } from "./client/http-client";
export type { NetboxClientConfig } from "./client/http-client";

export { NetboxDeviceRepositoryImpl, DEFAULT_NETBOX_PAGE_SIZE } from "./repositories/device-repository.impl";
export type { NetboxDeviceRepository } from "./repositories/device-repository.interface";

export {
  NetboxDeviceSchema,
  NetboxDeviceListSchema,
  NetboxIpAddressSchema,
  NetboxStatusSchema,
} from "./types/api-responses";
export type { NetboxDevice, NetboxDeviceList, NetboxIpAddress, NetboxStatus } from "./types/api-responses";
