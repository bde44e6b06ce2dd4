/**
 * Netbox API Response Types
 *
 * Only the fields the sync reads are declared; everything else
 * Netbox returns is kept untouched by `passthrough()`.
 */

import { z } from "zod";

export const NetboxIpAddressSchema = z
  .object({
    id: z.number().optional(),
    address: z.string(), // CIDR notation, e.g. "10.0.0.1/24"
  })
  .passthrough();

/**
 * Device (/api/dcim/devices/) or virtual machine (/api/virtualization/virtual-machines/)
 */
export const NetboxDeviceSchema = z
  .object({
    id: z.number(),
    name: z.string().nullish(),
    primary_ip4: NetboxIpAddressSchema.nullish(),
  })
  .passthrough();

export const NetboxDeviceListSchema = z.object({
  count: z.number(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(NetboxDeviceSchema),
});

/**
 * GET /api/status/
 */
export const NetboxStatusSchema = z
  .object({
    "netbox-version": z.string().optional(),
  })
  .passthrough();

export type NetboxIpAddress = z.infer<typeof NetboxIpAddressSchema>;
export type NetboxDevice = z.infer<typeof NetboxDeviceSchema>;
export type NetboxDeviceList = z.infer<typeof NetboxDeviceListSchema>;
export type NetboxStatus = z.infer<typeof NetboxStatusSchema>;
