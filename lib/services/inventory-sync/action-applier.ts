/**
 * Action Applier
 *
 * Registers and disables devices in Netshot, one at a time.
 * A failed action is logged and recorded; the rest of the batch still runs.
 */

import type { NetshotDeviceRepository } from "../../infrastructure/netshot";
import type { Logger } from "../../utils/logger";
import { ActionError } from "./errors";
import type { ApplyResult, DeviceAction, ReconciliationResult } from "./types";

export type DeviceActionTarget = Pick<NetshotDeviceRepository, "registerDevice" | "disableDevice">;

export interface ActionApplierOptions {
  target: DeviceActionTarget;
  domainId: number;
  dryRun: boolean;
  logger: Logger;
}

export class ActionApplier {
  private readonly target: DeviceActionTarget;
  private readonly domainId: number;
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(options: ActionApplierOptions) {
    this.target = options.target;
    this.domainId = options.domainId;
    this.dryRun = options.dryRun;
    this.logger = options.logger.child("Applier");
  }

  async apply(result: Pick<ReconciliationResult, "toRegister" | "toDisable">): Promise<ApplyResult> {
    const outcome: ApplyResult = {
      skipped: this.dryRun,
      registered: [],
      disabled: [],
      failures: [],
    };

    if (this.dryRun) {
      this.logger.info(
        `Check mode enabled, no change pushed to Netshot (${result.toRegister.size} to add, ${result.toDisable.size} to disable)`,
      );
      return outcome;
    }

    for (const ip of result.toRegister) {
      const failure = await this.attempt("register", ip, async () => {
        await this.target.registerDevice(ip, this.domainId);
      });
      if (failure) {
        this.logger.warn(`Registration failure: ${failure.message}`);
        outcome.failures.push(failure);
      } else {
        outcome.registered.push(ip);
      }
    }

    for (const ip of result.toDisable) {
      const failure = await this.attempt("disable", ip, () => this.target.disableDevice(ip));
      if (failure) {
        this.logger.warn(`Disable failure: ${failure.message}`);
        outcome.failures.push(failure);
      } else {
        outcome.disabled.push(ip);
      }
    }

    this.logger.info(
      `Applied changes: ${outcome.registered.length} registered, ${outcome.disabled.length} disabled, ${outcome.failures.length} failed`,
    );

    return outcome;
  }

  private async attempt(
    action: DeviceAction,
    ip: string,
    operation: () => Promise<void>,
  ): Promise<ActionError | null> {
    try {
      await operation();
      return null;
    } catch (error) {
      return new ActionError(action, ip, error);
    }
  }
}
