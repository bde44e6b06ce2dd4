/**
 * Netbox HTTP Client
 *
 * Token-authenticated access to the Netbox REST API
 */

import { UpstreamHttpClient } from "../../http/http-client";
import type { Logger } from "../../../utils/logger";

export interface NetboxClientConfig {
  url: string;
  token?: string; // read-only instances may allow anonymous access
  proxy?: string;
  tlsClientCertificate?: string;
  tlsClientCertificatePassword?: string;
  defaultTimeout?: number;
  logger: Logger;
}

export class NetboxHttpClient extends UpstreamHttpClient {
  constructor(config: NetboxClientConfig) {
    super({
      upstream: "netbox",
      baseUrl: config.url,
      headers: config.token ? { Authorization: `Token ${config.token}` } : {},
      proxy: config.proxy,
      tlsClientCertificate: config.tlsClientCertificate,
      tlsClientCertificatePassword: config.tlsClientCertificatePassword,
      defaultTimeout: config.defaultTimeout,
      logger: config.logger.child("Netbox HTTP"),
    });
  }
}
