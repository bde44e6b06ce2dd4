/**
 * Sync configuration registry
 *
 * Each option can be given as a CLI flag or through its environment variable.
 * Flags win over the environment.
 */

export type ConfigValueType = "string" | "boolean";

export interface ConfigDefinition {
  flag: string;
  short?: string;
  envVar?: string;
  type: ConfigValueType;
  description: string;
  secret?: boolean;
}

export const CONFIG_DEFINITIONS = {
  debug: {
    flag: "--debug",
    short: "-d",
    type: "boolean",
    description: "Enable debug/verbose mode",
  },
  logDirectory: {
    flag: "--log-directory",
    envVar: "LOG_DIRECTORY",
    type: "string",
    description: "The directory to log to (default: logs)",
  },
  netshotUrl: {
    flag: "--netshot-url",
    envVar: "NETSHOT_URL",
    type: "string",
    description: "The Netshot API URL",
  },
  netshotTlsClientCertificate: {
    flag: "--netshot-tls-client-certificate",
    envVar: "NETSHOT_TLS_CLIENT_CERTIFICATE",
    type: "string",
    description: "The TLS certificate to use to authenticate to Netshot (PKCS12 format)",
  },
  netshotTlsClientCertificatePassword: {
    flag: "--netshot-tls-client-certificate-password",
    envVar: "NETSHOT_TLS_CLIENT_CERTIFICATE_PASSWORD",
    type: "string",
    description: "The optional password for the Netshot PKCS12 file",
    secret: true,
  },
  netshotToken: {
    flag: "--netshot-token",
    envVar: "NETSHOT_TOKEN",
    type: "string",
    description: "The Netshot token",
    secret: true,
  },
  netshotDomainId: {
    flag: "--netshot-domain-id",
    envVar: "NETSHOT_DOMAIN_ID",
    type: "string",
    description: "The domain ID to use when importing a new device",
  },
  netshotProxy: {
    flag: "--netshot-proxy",
    envVar: "NETSHOT_PROXY",
    type: "string",
    description: "HTTP(s) proxy to use to connect to Netshot",
  },
  netboxUrl: {
    flag: "--netbox-url",
    envVar: "NETBOX_URL",
    type: "string",
    description: "The Netbox API URL",
  },
  netboxTlsClientCertificate: {
    flag: "--netbox-tls-client-certificate",
    envVar: "NETBOX_TLS_CLIENT_CERTIFICATE",
    type: "string",
    description: "The TLS certificate to use to authenticate to Netbox (PKCS12 format)",
  },
  netboxTlsClientCertificatePassword: {
    flag: "--netbox-tls-client-certificate-password",
    envVar: "NETBOX_TLS_CLIENT_CERTIFICATE_PASSWORD",
    type: "string",
    description: "The optional password for the Netbox PKCS12 file",
    secret: true,
  },
  netboxToken: {
    flag: "--netbox-token",
    envVar: "NETBOX_TOKEN",
    type: "string",
    description: "The Netbox token",
    secret: true,
  },
  netboxDevicesFilter: {
    flag: "--netbox-devices-filter",
    envVar: "NETBOX_DEVICES_FILTER",
    type: "string",
    description: "The querystring to use to select the devices from Netbox",
  },
  netboxVmsFilter: {
    flag: "--netbox-vms-filter",
    envVar: "NETBOX_VMS_FILTER",
    type: "string",
    description: "The querystring to use to select the VMs from Netbox",
  },
  netboxProxy: {
    flag: "--netbox-proxy",
    envVar: "NETBOX_PROXY",
    type: "string",
    description: "HTTP(s) proxy to use to connect to Netbox",
  },
  check: {
    flag: "--check",
    short: "-c",
    type: "boolean",
    description: "Check mode, will not push any change to Netshot",
  },
} satisfies Record<string, ConfigDefinition>;

export type ConfigKey = keyof typeof CONFIG_DEFINITIONS;

export type RawConfigValues = Partial<Record<ConfigKey, string | boolean>>;
