import { readFile, writeFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../models/errors';

export const DEFAULT_CONFIG_PATH = 'mqtt-control.yaml';

const PortSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

export const ConfigFileSchema = z.object({
  port_mqtt: PortSchema.default('1883'),
  port_tls: PortSchema.default('1881'),
  port_web: PortSchema.default('1880'),
  port_ws: PortSchema.default(''),
  tls_cert_file: z.string().default('cert.ec.pem'),
  tls_key_file: z.string().default('cert-key.ec.pem'),
  tls_ca_file: z.string().default(''),
  // milliseconds a client has to send CONNECT
  connect_timeout: z.number().int().positive().default(30000),
  // queued outgoing packets per client while it is connecting
  queue_limit: z.number().int().positive().default(42),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const ENV_OVERRIDES: Record<string, keyof ConfigFile> = {
  MQTT_PORT_MQTT: 'port_mqtt',
  MQTT_PORT_TLS: 'port_tls',
  MQTT_PORT_WEB: 'port_web',
  MQTT_PORT_WS: 'port_ws',
};

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ConfigFile {
  let merged: Record<string, unknown> = {};
  if (raw !== null && raw !== undefined) {
    if (typeof raw !== 'object' || Array.isArray(raw)) {
      throw new ConfigError('config file must be a mapping');
    }
    merged = { ...raw };
  }
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  const result = ConfigFileSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`invalid config: ${issues.join('; ')}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Reads the YAML config file. A missing file is created with the defaults,
 * so operators get a file to edit on first start.
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      const defaults = parseConfig({}, {});
      await writeFile(path, YAML.stringify(defaults), 'utf8');
      return parseConfig({}, env);
    }
    throw new ConfigError(`cannot read config file ${path}: ${errorMessage(error)}`, { cause: error });
  }
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`config file ${path} is not valid YAML: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(raw, env);
}

function checkPort(port: number, value: string): number {
  if (!Number.isInteger(port) || port < 0 || port >= 65535) {
    throw new ConfigError(`invalid port in listen address "${value}"`);
  }
  return port;
}

/**
 * Normalizes a listen address. A bare port becomes a bind-all address
 * (`1883` → `:1883`); empty values and ports outside 1–65534 yield `''`,
 * which disables the listener.
 */
export function normalizeAddress(value: string | number | undefined): string {
  if (value === undefined) {
    return '';
  }
  const text = String(value).trim();
  if (text === '') {
    return '';
  }
  if (/^\d+$/.test(text)) {
    const port = Number(text);
    return port > 0 && port < 65535 ? `:${port}` : '';
  }
  const colon = text.lastIndexOf(':');
  if (colon < 0 || !/^\d+$/.test(text.slice(colon + 1))) {
    throw new ConfigError(`invalid listen address "${text}"`);
  }
  const port = Number(text.slice(colon + 1));
  return port > 0 && port < 65535 ? text : '';
}

export interface BindTarget {
  host?: string;
  port: number;
}

export function parseAddress(address: string): BindTarget {
  const colon = address.lastIndexOf(':');
  if (colon < 0) {
    throw new ConfigError(`listen address "${address}" has no port`);
  }
  const port = checkPort(Number(address.slice(colon + 1)), address);
  const host = address.slice(0, colon).replace(/^\[(.*)\]$/, '$1');
  return host === '' ? { port } : { host, port };
}
