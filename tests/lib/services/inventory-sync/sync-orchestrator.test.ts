import { describe, it, expect, vi, beforeEach } from "vitest";
import type { NetboxDevice, NetboxDeviceRepository } from "../../../../lib/infrastructure/netbox";
import type { NetshotDevice, NetshotDeviceRepository, NetshotTask } from "../../../../lib/infrastructure/netshot";
import { UpstreamAuthError } from "../../../../lib/infrastructure/errors";
import {
  FetchError,
  InventorySyncOrchestrator,
  type SyncOptions,
} from "../../../../lib/services/inventory-sync";
import { RecordingLogger } from "../../../mocks/logger";
import { netboxDevice, netshotDevice } from "../../../fixtures/inventory-records";

class FakeNetboxRepository implements NetboxDeviceRepository {
  devices: NetboxDevice[] = [];
  vms: NetboxDevice[] = [];
  ping = vi.fn(async (): Promise<void> => undefined);
  getDevices = vi.fn(async (_filter: string): Promise<NetboxDevice[]> => this.devices);
  getVirtualMachines = vi.fn(async (_filter: string): Promise<NetboxDevice[]> => this.vms);
}

class FakeNetshotRepository implements NetshotDeviceRepository {
  devices: NetshotDevice[] = [];
  ping = vi.fn(async (): Promise<void> => undefined);
  getDevices = vi.fn(async (): Promise<NetshotDevice[]> => this.devices);
  registerDevice = vi.fn(async (_ip: string, _domainId: number): Promise<NetshotTask> => ({ id: 900 }));
  disableDevice = vi.fn(async (_ip: string): Promise<void> => undefined);
}

describe("InventorySyncOrchestrator", () => {
  let logger: RecordingLogger;
  let netbox: FakeNetboxRepository;
  let netshot: FakeNetshotRepository;

  const baseOptions: SyncOptions = {
    devicesFilter: "status=active",
    domainId: 2,
    dryRun: false,
  };

  beforeEach(() => {
    logger = new RecordingLogger();
    netbox = new FakeNetboxRepository();
    netshot = new FakeNetshotRepository();

    netbox.devices = [netboxDevice(1, "r1", "10.0.0.1/24"), netboxDevice(2, "r2", "10.0.0.2/24")];
    netshot.devices = [netshotDevice(11, "r2", "10.0.0.2"), netshotDevice(12, "r3", "10.0.0.3")];
  });

  function createOrchestrator(options: Partial<SyncOptions> = {}): InventorySyncOrchestrator {
    return new InventorySyncOrchestrator({ netbox, netshot, logger }, { ...baseOptions, ...options });
  }

  it("should register missing devices and disable stale ones", async () => {
    const report = await createOrchestrator().run();

    expect(netbox.getDevices).toHaveBeenCalledWith("status=active");
    expect(netbox.getVirtualMachines).not.toHaveBeenCalled();
    expect(netshot.registerDevice.mock.calls).toEqual([["10.0.0.1", 2]]);
    expect(netshot.disableDevice.mock.calls).toEqual([["10.0.0.3"]]);
    expect(report.netboxInventorySize).toBe(2);
    expect(report.netshotInventorySize).toBe(2);
    expect([...report.reconciliation.toRegister]).toEqual(["10.0.0.1"]);
    expect([...report.reconciliation.toDisable]).toEqual(["10.0.0.3"]);
    expect(logger.messages("info")).toContain("Found 1 devices missing on Netshot, to be added");
    expect(logger.messages("info")).toContain("Found 1 devices missing on Netbox, to be disabled");
  });

  it("should compute the same classification without touching Netshot in check mode", async () => {
    const report = await createOrchestrator({ dryRun: true }).run();

    expect([...report.reconciliation.toRegister]).toEqual(["10.0.0.1"]);
    expect([...report.reconciliation.toDisable]).toEqual(["10.0.0.3"]);
    expect(report.applied.skipped).toBe(true);
    expect(netshot.registerDevice).not.toHaveBeenCalled();
    expect(netshot.disableDevice).not.toHaveBeenCalled();
  });

  it("should append virtual machines when a VM filter is set", async () => {
    netbox.vms = [netboxDevice(500, "vm-router", "10.0.0.3/24")];

    const report = await createOrchestrator({ vmsFilter: "role=router" }).run();

    expect(netbox.getVirtualMachines).toHaveBeenCalledWith("role=router");
    expect(report.netboxInventorySize).toBe(3);
    expect(report.reconciliation.toDisable.size).toBe(0);
    expect(netshot.disableDevice).not.toHaveBeenCalled();
  });

  it("should leave devices without primary IP out of every action", async () => {
    netbox.devices.push(netboxDevice(3, "no-ip", null));

    const report = await createOrchestrator().run();

    expect(report.netboxInventorySize).toBe(2);
    expect(netshot.registerDevice.mock.calls).toEqual([["10.0.0.1", 2]]);
  });

  it("should complete even when a register call fails", async () => {
    netbox.devices.push(netboxDevice(4, "r4", "10.0.0.4/24"));
    netshot.registerDevice.mockRejectedValueOnce(new Error("discovery refused"));

    const report = await createOrchestrator().run();

    expect(netshot.registerDevice).toHaveBeenCalledTimes(2);
    expect(report.applied.registered).toEqual(["10.0.0.4"]);
    expect(report.applied.failures.map((failure) => failure.ip)).toEqual(["10.0.0.1"]);
  });

  it("should abort with FetchError when the Netbox listing fails", async () => {
    netbox.getDevices.mockRejectedValueOnce(new UpstreamAuthError("netbox request failed with status 403", "netbox", 403));

    const run = createOrchestrator().run();

    await expect(run).rejects.toBeInstanceOf(FetchError);
    await expect(run).rejects.toMatchObject({
      source: "netbox",
      message: "Failed to list devices from netbox: netbox request failed with status 403",
    });
    expect(netshot.registerDevice).not.toHaveBeenCalled();
    expect(netshot.disableDevice).not.toHaveBeenCalled();
  });

  it("should abort before listing anything when Netshot cannot be reached", async () => {
    netshot.ping.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    await expect(createOrchestrator().run()).rejects.toMatchObject({
      name: "FetchError",
      source: "netshot",
    });
    expect(netshot.getDevices).not.toHaveBeenCalled();
    expect(netbox.getDevices).not.toHaveBeenCalled();
  });
});
