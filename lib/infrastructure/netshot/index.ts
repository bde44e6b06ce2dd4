/**
 * Netshot Infrastructure Module
 *
 * Access to the Netshot configuration-management inventory
 */

export { NetshotHttpClient } from "./client/http-client";
export type { NetshotClientConfig } from "./client/http-client";

export { NetshotDeviceRepositoryImpl, DEFAULT_NETSHOT_PAGE_SIZE } from "./repositories/device-repository.impl";
export type { NetshotDeviceRepository } from "./repositories/device-repository.interface";

export {
  NETSHOT_DISABLED_STATUS,
  NetshotDeviceSchema,
  NetshotDeviceListSchema,
  NetshotDeviceSearchResultSchema,
  NetshotManagementAddressSchema,
  NetshotServerInfoSchema,
  NetshotTaskSchema,
} from "./types/api-responses";
export type {
  NetshotDevice,
  NetshotDeviceSearchResult,
  NetshotDeviceUpdate,
  NetshotManagementAddress,
  NetshotNewDevice,
  NetshotServerInfo,
  NetshotTask,
} from "./types/api-responses";
