/**
 * Netbox and Netshot record builders
 */

import type { NetboxDevice } from "../../lib/infrastructure/netbox";
import type { NetshotDevice } from "../../lib/infrastructure/netshot";

export function netboxDevice(id: number, name: string | null, address?: string | null): NetboxDevice {
  return {
    id,
    name,
    primary_ip4: address === undefined || address === null ? address : { id: id * 10, address },
  };
}

export function netshotDevice(id: number, name: string, ip: string, status = "INPRODUCTION"): NetshotDevice {
  return {
    id,
    name,
    mgmtAddress: { ip, prefixLength: 0, addressUsage: "PRIMARY" },
    status,
    family: "Cisco IOS and IOS-XE",
  };
}
