/**
 * Netbox → Netshot sync command
 *
 * Exit codes: 0 when every device was attempted (action failures included),
 * 1 on invalid configuration or when either inventory cannot be fetched.
 */

import { ConfigError, formatUsage, loadSyncConfig, parseCliArgs, redactConfig, type SyncConfig } from "./config";
import { NetboxDeviceRepositoryImpl, NetboxHttpClient, type NetboxDeviceRepository } from "./infrastructure/netbox";
import { NetshotDeviceRepositoryImpl, NetshotHttpClient, type NetshotDeviceRepository } from "./infrastructure/netshot";
import { FetchError, InventorySyncOrchestrator, type SyncReport } from "./services/inventory-sync";
import { createLogger, type Logger } from "./utils/logger";

export interface SyncRepositories {
  netbox: NetboxDeviceRepository;
  netshot: NetshotDeviceRepository;
}

export type RepositoryFactory = (config: SyncConfig, logger: Logger) => SyncRepositories;

export interface RunSyncOptions {
  createRepositories?: RepositoryFactory;
  createRunLogger?: (config: SyncConfig) => Logger;
  onReport?: (report: SyncReport) => void;
}

export const createHttpRepositories: RepositoryFactory = (config, logger) => {
  const netboxClient = new NetboxHttpClient({
    url: config.netboxUrl,
    token: config.netboxToken,
    proxy: config.netboxProxy,
    tlsClientCertificate: config.netboxTlsClientCertificate,
    tlsClientCertificatePassword: config.netboxTlsClientCertificatePassword,
    logger,
  });

  const netshotClient = new NetshotHttpClient({
    url: config.netshotUrl,
    token: config.netshotToken,
    proxy: config.netshotProxy,
    tlsClientCertificate: config.netshotTlsClientCertificate,
    tlsClientCertificatePassword: config.netshotTlsClientCertificatePassword,
    logger,
  });

  return {
    netbox: new NetboxDeviceRepositoryImpl(netboxClient, logger),
    netshot: new NetshotDeviceRepositoryImpl(netshotClient, logger),
  };
};

function createDefaultLogger(config: SyncConfig): Logger {
  return createLogger({
    level: config.debug ? "debug" : "info",
    directory: config.logDirectory,
  });
}

/**
 * Run one sync and return the process exit code
 */
export async function runSync(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  options: RunSyncOptions = {},
): Promise<number> {
  let config: SyncConfig;
  try {
    if (parseCliArgs(argv).help) {
      console.log(formatUsage());
      return 0;
    }
    config = loadSyncConfig(argv, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      console.error("");
      console.error("Run with --help to list the available options");
      return 1;
    }
    throw error;
  }

  const logger = (options.createRunLogger ?? createDefaultLogger)(config);
  logger.info(`Logger initialized with level ${logger.level}`);
  logger.debug("CLI Parameters:", redactConfig(config));

  try {
    const repositories = (options.createRepositories ?? createHttpRepositories)(config, logger);
    const orchestrator = new InventorySyncOrchestrator(
      { ...repositories, logger },
      {
        devicesFilter: config.netboxDevicesFilter,
        vmsFilter: config.netboxVmsFilter,
        domainId: config.netshotDomainId,
        dryRun: config.check,
      },
    );

    const report = await orchestrator.run();
    options.onReport?.(report);
    return 0;
  } catch (error) {
    if (error instanceof FetchError) {
      logger.error(error.message);
    } else {
      logger.error("Sync aborted:", error);
    }
    return 1;
  }
}
