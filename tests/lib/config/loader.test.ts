import { describe, it, expect } from "vitest";
import {
  ConfigError,
  formatUsage,
  loadSyncConfig,
  parseCliArgs,
  redactConfig,
} from "../../../lib/config";

const REQUIRED_ENV = {
  NETBOX_URL: "https://netbox.example.test",
  NETSHOT_URL: "https://netshot.example.test",
  NETSHOT_TOKEN: "test-netshot-token",
  NETSHOT_DOMAIN_ID: "2",
};

describe("parseCliArgs", () => {
  it("should read switches, spaced values and inline values", () => {
    const parsed = parseCliArgs([
      "-d",
      "--check",
      "--netbox-url",
      "https://netbox.example.test",
      "--netbox-devices-filter=site=dc1&status=active",
    ]);

    expect(parsed).toEqual({
      help: false,
      values: {
        debug: true,
        check: true,
        netboxUrl: "https://netbox.example.test",
        netboxDevicesFilter: "site=dc1&status=active",
      },
    });
  });

  it("should flag help requests", () => {
    expect(parseCliArgs(["--help"]).help).toBe(true);
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("should reject unknown arguments", () => {
    expect(() => parseCliArgs(["--netbox-uri", "x"])).toThrow("Unknown argument: --netbox-uri");
  });

  it("should reject an option missing its value", () => {
    expect(() => parseCliArgs(["--netshot-url", "--check"])).toThrow("--netshot-url requires a value");
    expect(() => parseCliArgs(["--netshot-url"])).toThrow(ConfigError);
  });

  it("should reject a value given to a switch", () => {
    expect(() => parseCliArgs(["--check=yes"])).toThrow("--check does not take a value");
  });
});

describe("loadSyncConfig", () => {
  it("should build the configuration from the environment with defaults", () => {
    const config = loadSyncConfig([], REQUIRED_ENV);

    expect(config).toEqual({
      debug: false,
      check: false,
      logDirectory: "logs",
      netboxUrl: "https://netbox.example.test",
      netboxDevicesFilter: "",
      netshotUrl: "https://netshot.example.test",
      netshotToken: "test-netshot-token",
      netshotDomainId: 2,
    });
  });

  it("should let flags override the environment", () => {
    const config = loadSyncConfig(
      ["--netshot-domain-id", "7", "--log-directory", "/tmp/sync-logs", "--netbox-vms-filter", "role=router"],
      { ...REQUIRED_ENV, LOG_DIRECTORY: "env-logs" },
    );

    expect(config.netshotDomainId).toBe(7);
    expect(config.logDirectory).toBe("/tmp/sync-logs");
    expect(config.netboxVmsFilter).toBe("role=router");
    expect(config.debug).toBe(false);
  });

  it("should ignore a DEBUG variable meant for other tools", () => {
    expect(loadSyncConfig([], { ...REQUIRED_ENV, DEBUG: "express:*" }).debug).toBe(false);
    expect(loadSyncConfig([], { ...REQUIRED_ENV, DEBUG: "true" }).debug).toBe(false);
    expect(loadSyncConfig(["-d"], REQUIRED_ENV).debug).toBe(true);
  });

  it("should accept domain id 0", () => {
    expect(loadSyncConfig([], { ...REQUIRED_ENV, NETSHOT_DOMAIN_ID: "0" }).netshotDomainId).toBe(0);
    expect(() => loadSyncConfig(["--netshot-domain-id", "-1"], REQUIRED_ENV)).toThrow(ConfigError);
  });

  it("should treat empty environment values as unset", () => {
    const config = loadSyncConfig([], { ...REQUIRED_ENV, NETBOX_VMS_FILTER: "", NETBOX_TOKEN: "" });

    expect(config.netboxVmsFilter).toBeUndefined();
    expect(config.netboxToken).toBeUndefined();
  });

  it("should list every missing required option", () => {
    expect(() => loadSyncConfig([], {})).toThrow(ConfigError);

    try {
      loadSyncConfig([], { NETBOX_URL: "https://netbox.example.test" });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const message = error instanceof Error ? error.message : "";
      expect(message).toContain("--netshot-url (NETSHOT_URL)");
      expect(message).toContain("--netshot-token (NETSHOT_TOKEN)");
      expect(message).toContain("--netshot-domain-id (NETSHOT_DOMAIN_ID)");
      expect(message).not.toContain("NETBOX_URL");
    }
  });

  it("should reject a non-numeric domain id", () => {
    expect(() => loadSyncConfig(["--netshot-domain-id", "lab"], REQUIRED_ENV)).toThrow(ConfigError);
  });
});

describe("redactConfig", () => {
  it("should mask tokens and certificate passwords only", () => {
    const config = loadSyncConfig(
      ["--netbox-token", "test-netbox-token", "--netbox-tls-client-certificate-password", "test-secret"],
      REQUIRED_ENV,
    );

    const redacted = redactConfig(config);

    expect(redacted.netshotToken).toBe("********");
    expect(redacted.netboxToken).toBe("********");
    expect(redacted.netboxTlsClientCertificatePassword).toBe("********");
    expect(redacted.netshotTlsClientCertificatePassword).toBeUndefined();
    expect(redacted.netboxUrl).toBe("https://netbox.example.test");
  });
});

describe("formatUsage", () => {
  it("should document flags with their environment variable", () => {
    const usage = formatUsage().split("\n");

    expect(usage).toContain("  -c, --check");
    expect(usage).toContain("      --netshot-token <value>");
    expect(usage).toContain("        The Netshot token [env: NETSHOT_TOKEN]");
  });
});
