/**
 * Netshot API Response Types
 */

import { z } from "zod";

export const NETSHOT_DISABLED_STATUS = "DISABLED";

export const NetshotManagementAddressSchema = z
  .object({
    ip: z.string(),
    prefixLength: z.number().optional(),
    addressUsage: z.string().optional(),
  })
  .passthrough();

/**
 * Device as listed by GET /api/devices and POST /api/devices/search
 */
export const NetshotDeviceSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    mgmtAddress: NetshotManagementAddressSchema,
    status: z.string().optional(), // INPRODUCTION, DISABLED, PREPRODUCTION
    family: z.string().optional(),
  })
  .passthrough();

export const NetshotDeviceListSchema = z.array(NetshotDeviceSchema);

export const NetshotDeviceSearchResultSchema = z
  .object({
    query: z.string().optional(),
    devices: z.array(NetshotDeviceSchema),
  })
  .passthrough();

/**
 * Task created by POST /api/devices (device discovery)
 */
export const NetshotTaskSchema = z
  .object({
    id: z.number(),
    status: z.string().optional(),
  })
  .passthrough();

/**
 * GET /api/server/info
 */
export const NetshotServerInfoSchema = z
  .object({
    serverVersion: z.string().optional(),
  })
  .passthrough();

export type NetshotManagementAddress = z.infer<typeof NetshotManagementAddressSchema>;
export type NetshotDevice = z.infer<typeof NetshotDeviceSchema>;
export type NetshotDeviceSearchResult = z.infer<typeof NetshotDeviceSearchResultSchema>;
export type NetshotTask = z.infer<typeof NetshotTaskSchema>;
export type NetshotServerInfo = z.infer<typeof NetshotServerInfoSchema>;

/**
 * Body of POST /api/devices
 */
export interface NetshotNewDevice {
  autoDiscover: boolean;
  ipAddress: string;
  domainId: number;
}

/**
 * Body of PUT /api/devices/{id}
 */
export interface NetshotDeviceUpdate {
  enabled: boolean;
}
