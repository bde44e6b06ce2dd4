/**
 * Upstream HTTP Client
 *
 * Low-level HTTP client shared by the Netbox and Netshot integrations:
 * - Per-upstream auth headers
 * - Optional PKCS#12 TLS client certificate
 * - Optional HTTP(S) proxy
 * - Error mapping and response validation
 */

import * as fs from "node:fs";
import * as https from "node:https";
import axios, { type AxiosInstance, type AxiosProxyConfig, type Method } from "axios";
import type { ZodType, ZodTypeDef } from "zod";
import {
  UpstreamConfigError,
  UpstreamResponseError,
  parseUpstreamError,
  type UpstreamName,
} from "../errors";
import type { Logger } from "../../utils/logger";

export interface UpstreamHttpClientConfig {
  upstream: UpstreamName;
  baseUrl: string;
  headers?: Record<string, string>;
  proxy?: string;
  tlsClientCertificate?: string; // path to a PKCS#12 bundle
  tlsClientCertificatePassword?: string;
  defaultTimeout?: number; // milliseconds
  logger: Logger;
}

export interface RequestOptions {
  params?: URLSearchParams;
  body?: unknown;
  timeout?: number;
}

type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Convert a proxy URL into the axios proxy configuration
 */
export function parseProxyUrl(proxyUrl: string, upstream: UpstreamName): AxiosProxyConfig {
  let url: URL;
  try {
    url = new URL(proxyUrl);
  } catch (error) {
    throw new UpstreamConfigError(`Invalid ${upstream} proxy URL: ${proxyUrl}`, upstream, error);
  }

  const protocol = url.protocol.replace(/:$/, "");
  const proxy: AxiosProxyConfig = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : protocol === "https" ? 443 : 80,
  };

  if (url.username) {
    proxy.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    };
  }

  return proxy;
}

function loadClientCertificate(
  path: string,
  password: string | undefined,
  upstream: UpstreamName,
): https.Agent {
  let pfx: Buffer;
  try {
    pfx = fs.readFileSync(path);
  } catch (error) {
    throw new UpstreamConfigError(`Unable to read ${upstream} TLS client certificate at ${path}`, upstream, error);
  }

  return new https.Agent({ pfx, passphrase: password });
}

/**
 * Upstream HTTP Client
 * Handles transport, error mapping and schema validation for one upstream API
 */
export class UpstreamHttpClient {
  private readonly http: AxiosInstance;
  private readonly upstream: UpstreamName;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(config: UpstreamHttpClientConfig) {
    if (!config.baseUrl) {
      throw new UpstreamConfigError(`${config.upstream} URL is required`, config.upstream);
    }

    this.upstream = config.upstream;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.logger = config.logger;

    const httpsAgent = config.tlsClientCertificate
      ? loadClientCertificate(config.tlsClientCertificate, config.tlsClientCertificatePassword, config.upstream)
      : undefined;

    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: config.defaultTimeout ?? 30000,
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        ...config.headers,
      },
      httpsAgent,
      proxy: config.proxy ? parseProxyUrl(config.proxy, config.upstream) : undefined,
    });
  }

  async get<T>(path: string, schema: ResponseSchema<T>, options: RequestOptions = {}): Promise<T> {
    return this.request("GET", path, schema, options);
  }

  async post<T>(path: string, body: unknown, schema: ResponseSchema<T>, options: RequestOptions = {}): Promise<T> {
    return this.request("POST", path, schema, { ...options, body });
  }

  async put<T>(path: string, body: unknown, schema: ResponseSchema<T>, options: RequestOptions = {}): Promise<T> {
    return this.request("PUT", path, schema, { ...options, body });
  }

  /**
   * Execute a single request and validate its body
   */
  private async request<T>(
    method: Method,
    path: string,
    schema: ResponseSchema<T>,
    options: RequestOptions,
  ): Promise<T> {
    const query = options.params?.toString();
    const endpoint = query ? `${path}?${query}` : path;

    this.logger.debug(`${method} ${this.baseUrl}${endpoint}`);

    let data: unknown;
    try {
      const response = await this.http.request<unknown>({
        method,
        url: endpoint,
        data: options.body,
        timeout: options.timeout,
      });
      data = response.data;
    } catch (error) {
      throw parseUpstreamError(error, this.upstream, endpoint);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
      throw new UpstreamResponseError(
        `Unexpected ${this.upstream} response from ${endpoint}: ${issues.slice(0, 3).join("; ")}`,
        this.upstream,
        endpoint,
        issues,
        parsed.error,
      );
    }

    return parsed.data;
  }
}
