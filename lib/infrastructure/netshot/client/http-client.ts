/**
 * Netshot HTTP Client
 *
 * API-token access to the Netshot REST API
 */

import { UpstreamConfigError } from "../../errors";
import { UpstreamHttpClient } from "../../http/http-client";
import type { Logger } from "../../../utils/logger";

export interface NetshotClientConfig {
  url: string;
  token: string;
  proxy?: string;
  tlsClientCertificate?: string;
  tlsClientCertificatePassword?: string;
  defaultTimeout?: number;
  logger: Logger;
}

export class NetshotHttpClient extends UpstreamHttpClient {
  constructor(config: NetshotClientConfig) {
    if (!config.token) {
      throw new UpstreamConfigError("Netshot API token is required", "netshot");
    }

    super({
      upstream: "netshot",
      baseUrl: config.url,
      headers: { "X-Netshot-API-Token": config.token },
      proxy: config.proxy,
      tlsClientCertificate: config.tlsClientCertificate,
      tlsClientCertificatePassword: config.tlsClientCertificatePassword,
      defaultTimeout: config.defaultTimeout,
      logger: config.logger.child("Netshot HTTP"),
    });
  }
}
