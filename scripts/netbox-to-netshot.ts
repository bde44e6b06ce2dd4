/**
 * Netbox → Netshot Inventory Sync
 *
 * Registers in Netshot the devices Netbox knows about and disables
 * the Netshot devices Netbox no longer lists (matched by IP address).
 *
 * CONFIGURATION:
 * - CLI flags, or environment variables in .env.local / .env:
 *   NETBOX_URL=https://netbox.example.com
 *   NETBOX_TOKEN=...
 *   NETSHOT_URL=https://netshot.example.com
 *   NETSHOT_TOKEN=...
 *   NETSHOT_DOMAIN_ID=1
 *
 * USAGE:
 *   npx tsx scripts/netbox-to-netshot.ts --check
 *   npx tsx scripts/netbox-to-netshot.ts --netbox-devices-filter "status=active" --netbox-vms-filter "role=router"
 *   npx tsx scripts/netbox-to-netshot.ts --help
 */

import * as dotenv from "dotenv";
import { runSync } from "../lib/cli";

// Load .env.local first (if exists), then .env as fallback
dotenv.config({ path: ".env.local" });
dotenv.config();

runSync(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("❌ Unexpected error:", error);
    process.exitCode = 1;
  });
