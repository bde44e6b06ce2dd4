import { z } from "zod";
import { CONFIG_DEFINITIONS, type ConfigDefinition, type ConfigKey, type RawConfigValues } from "./registry";

const CONFIG_KEYS = Object.keys(CONFIG_DEFINITIONS) as ConfigKey[];

const DEFAULT_LOG_DIRECTORY = "logs";

/**
 * Error thrown when the CLI arguments or the environment are unusable
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optionalText = z.string().min(1).optional();

export const SyncConfigSchema = z.object({
  debug: z.boolean(),
  logDirectory: z.string().min(1),
  check: z.boolean(),
  netshotUrl: z.string().url(),
  netshotToken: z.string().min(1),
  netshotDomainId: z.coerce.number().int().nonnegative(),
  netshotTlsClientCertificate: optionalText,
  netshotTlsClientCertificatePassword: optionalText,
  netshotProxy: z.string().url().optional(),
  netboxUrl: z.string().url(),
  netboxToken: optionalText,
  netboxTlsClientCertificate: optionalText,
  netboxTlsClientCertificatePassword: optionalText,
  netboxDevicesFilter: z.string(),
  netboxVmsFilter: z.string().optional(),
  netboxProxy: z.string().url().optional(),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export interface ParsedArgs {
  help: boolean;
  values: RawConfigValues;
}

function definitionOf(key: ConfigKey): ConfigDefinition {
  return CONFIG_DEFINITIONS[key];
}

function findOption(name: string): ConfigKey | undefined {
  return CONFIG_KEYS.find((key) => {
    const definition = definitionOf(key);
    return definition.flag === name || definition.short === name;
  });
}

/**
 * Parse `--flag value`, `--flag=value` and boolean switches
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { help: false, values: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const key = findOption(name);
    if (!key) {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }

    const definition = definitionOf(key);
    if (definition.type === "boolean") {
      if (eq !== -1) {
        throw new ConfigError(`${definition.flag} does not take a value`);
      }
      parsed.values[key] = true;
      continue;
    }

    if (eq !== -1) {
      parsed.values[key] = arg.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || (next.startsWith("-") && findOption(next.split("=")[0]) !== undefined)) {
      throw new ConfigError(`${definition.flag} requires a value`);
    }
    parsed.values[key] = next;
    i++;
  }

  return parsed;
}

function parseBoolean(raw: string): boolean {
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

/**
 * Read every option that has an environment variable; empty values count as unset
 */
export function readEnvironment(env: NodeJS.ProcessEnv): RawConfigValues {
  const values: RawConfigValues = {};

  for (const key of CONFIG_KEYS) {
    const definition = definitionOf(key);
    const raw = definition.envVar ? env[definition.envVar] : undefined;
    if (raw === undefined || raw === "") {
      continue;
    }
    values[key] = definition.type === "boolean" ? parseBoolean(raw) : raw;
  }

  return values;
}

/**
 * Build the run configuration from CLI arguments over environment variables
 */
export function loadSyncConfig(argv: readonly string[], env: NodeJS.ProcessEnv): SyncConfig {
  const { values: fromArgs } = parseCliArgs(argv);
  const merged: RawConfigValues = { ...readEnvironment(env), ...fromArgs };

  const result = SyncConfigSchema.safeParse({
    ...Object.fromEntries(CONFIG_KEYS.map((key) => [key, merged[key]])),
    debug: merged.debug ?? false,
    check: merged.check ?? false,
    logDirectory: merged.logDirectory ?? DEFAULT_LOG_DIRECTORY,
    netboxDevicesFilter: merged.netboxDevicesFilter ?? "",
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path[0];
      const label = typeof key === "string" ? describeOption(key) : "configuration";
      return `  ${label}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration:\n${problems.join("\n")}`);
  }

  return result.data;
}

function describeOption(name: string): string {
  const key = CONFIG_KEYS.find((candidate) => candidate === name);
  if (!key) {
    return name;
  }
  const definition = definitionOf(key);
  return definition.envVar ? `${definition.flag} (${definition.envVar})` : definition.flag;
}

/**
 * Configuration safe to print: secrets are masked
 */
export function redactConfig(config: SyncConfig): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    redacted[key] = definitionOf(key).secret && value !== undefined ? "********" : value;
  }
  return redacted;
}

export function formatUsage(program = "netbox-netshot-sync"): string {
  const lines = [
    `${program} - Synchronization tool between Netbox and Netshot`,
    "",
    `Usage: ${program} [options]`,
    "",
    "Options:",
  ];

  for (const key of CONFIG_KEYS) {
    const definition = definitionOf(key);
    const names = definition.short ? `${definition.short}, ${definition.flag}` : `    ${definition.flag}`;
    const placeholder = definition.type === "string" ? " <value>" : "";
    const env = definition.envVar ? ` [env: ${definition.envVar}]` : "";
    lines.push(`  ${names}${placeholder}`);
    lines.push(`        ${definition.description}${env}`);
  }
  lines.push("  -h, --help");
  lines.push("        Print this help");

  return lines.join("\n");
}
