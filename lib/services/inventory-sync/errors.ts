/**
 * Inventory Sync Errors
 *
 * FetchError aborts the run; ActionError is logged and the batch continues.
 */

import type { UpstreamName } from "../../infrastructure/errors";
import type { DeviceAction } from "./types";

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * An upstream inventory could not be read (or the upstream could not be reached)
 */
export class FetchError extends Error {
  constructor(
    public readonly source: UpstreamName,
    operation: string,
    cause: unknown,
  ) {
    super(`Failed to ${operation} from ${source}: ${describeCause(cause)}`, { cause });
    this.name = "FetchError";
  }
}

/**
 * A single register/disable call failed
 */
export class ActionError extends Error {
  constructor(
    public readonly action: DeviceAction,
    public readonly ip: string,
    cause: unknown,
  ) {
    super(`Failed to ${action} ${ip}: ${describeCause(cause)}`, { cause });
    this.name = "ActionError";
  }
}
