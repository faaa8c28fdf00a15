import { readFile } from 'node:fs/promises';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { parseAllowList, type AllowList } from './allow-list.js';
import { HOSTING_DE_API, MIN_TTL } from './constants.js';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

/** Where the HTTP server listens: a unix socket or a host/port pair */
export type Listen =
  | { kind: 'socket'; path: string }
  | { kind: 'tcp'; host: string; port: number };

export interface AppConfig {
  listen: Listen;
  allowList: AllowList;
  logLevel: LogLevel;
  provider: {
    zoneName: string;
    authToken: string;
    defaultTtl: number;
    apiUrl: string;
  };
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const mainSchema = z.object({
  bind_host: z.string().min(1).optional(),
  bind_port: z.number().int().min(1).max(65535).optional(),
  bind_socket: z.string().min(1).optional(),
  allowed_domains: z.union([z.literal(false), z.array(z.string())]).optional(),
  log_level: logLevelSchema.default('info'),
});

const providerSchema = z.object({
  zone: z.string().min(1),
  token: z.string().min(1),
  default_ttl: z.number().int().min(MIN_TTL),
  api_url: z.string().url().default(HOSTING_DE_API),
});

const configSchema = z.object({
  main: mainSchema,
  hosting_de_dns_api: providerSchema,
});

/**
 * Validate a parsed configuration document and turn it into an `AppConfig`.
 */
export function parseConfig(document: unknown): AppConfig {
  const result = configSchema.safeParse(document);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const { main, hosting_de_dns_api: provider } = result.data;

  return {
    listen: toListen(main),
    allowList: parseAllowList(main.allowed_domains),
    logLevel: main.log_level,
    provider: {
      zoneName: provider.zone,
      authToken: provider.token,
      defaultTtl: provider.default_ttl,
      apiUrl: provider.api_url,
    },
  };
}

function toListen(main: z.infer<typeof mainSchema>): Listen {
  if (main.bind_socket !== undefined) {
    return { kind: 'socket', path: main.bind_socket };
  }
  if (main.bind_host !== undefined && main.bind_port !== undefined) {
    return { kind: 'tcp', host: main.bind_host, port: main.bind_port };
  }
  throw new ConfigError(
    'Invalid configuration: main: either bind_socket or both bind_host and bind_port are required'
  );
}

/**
 * Read and validate a TOML configuration file.
 */
export async function loadConfig(path: string): Promise<AppConfig> {
  let source: string;
  try {
    source = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file "${path}": ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let document: unknown;
  try {
    document = parseToml(source);
  } catch (err) {
    throw new ConfigError(
      `Cannot parse config file "${path}": ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfig(document);
}
