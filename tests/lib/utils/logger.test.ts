import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "../../../lib/utils/logger";

describe("createLogger", () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "sync-logger-"));
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it("should drop messages below the configured level", () => {
    const logger = createLogger({ level: "info" });

    logger.debug("hidden");
    logger.info("shown");

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith("shown");
  });

  it("should prefix child loggers with their scope", () => {
    const logger = createLogger({ level: "debug" }).child("Netbox");

    logger.warn("Device r9 is missing its primary IP address, skipping it");

    expect(console.warn).toHaveBeenCalledWith("[Netbox] Device r9 is missing its primary IP address, skipping it");
  });

  it("should duplicate every emitted line to the log file", () => {
    const logger = createLogger({ level: "debug", directory, fileName: "run.log" });

    logger.info("Getting devices list from Netshot");
    logger.child("Applier").error("Disable failure");

    expect(logger.filePath).toBe(path.join(directory, "run.log"));
    const lines = fs.readFileSync(path.join(directory, "run.log"), "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ INFO  Getting devices list from Netshot$/);
    expect(lines[1]).toMatch(/^\S+ ERROR \[Applier\] Disable failure$/);
  });

  it("should create the log directory when missing", () => {
    const nested = path.join(directory, "nested", "logs");

    const logger = createLogger({ directory: nested });
    logger.info("started");

    expect(fs.readdirSync(nested)).toHaveLength(1);
    expect(logger.filePath?.startsWith(path.join(nested, "netbox-netshot-sync_"))).toBe(true);
  });

  it("should render object details as JSON", () => {
    const logger = createLogger({ level: "debug" });

    logger.debug("CLI Parameters:", { check: true });

    expect(console.debug).toHaveBeenCalledWith('CLI Parameters: {\n  "check": true\n}');
  });
});
