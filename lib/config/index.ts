// Barrel export for config module
export {
  ConfigError,
  SyncConfigSchema,
  formatUsage,
  loadSyncConfig,
  parseCliArgs,
  readEnvironment,
  redactConfig,
} from "./loader";
export type { ParsedArgs, SyncConfig } from "./loader";
export { CONFIG_DEFINITIONS } from "./registry";
export type { ConfigDefinition, ConfigKey, RawConfigValues } from "./registry";
