/**
 * Configuration loader
 *
 * Reads config.yml (or the file given by --config / --profile), layers
 * environment and command-line overrides on top, and validates the result.
 * A missing file is not an error: the defaults describe a TCP gateway at
 * 192.168.0.114:4403 sampled every 30 seconds.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { getLogger } from './logger';
import { Config, formatZodError, validateConfig } from './config-schema';

export type { Config } from './config-schema';

/** Settings that may come from the environment or the command line */
export interface ConfigOverrides {
  tcpHost?: string;
  tcpPort?: number;
  serialPort?: string;
  dataDir?: string;
  httpPort?: number;
  mode?: 'oneshot' | 'continuous';
  intervalSeconds?: number;
  verbose?: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  return isSection(value) ? { ...value } : {};
}

/** Strip undefined values so they don't shadow what the file says */
function defined(values: Section): Section {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

/**
 * Read MESH_* variables. Values are passed through as typed as possible;
 * anything malformed is left for schema validation to report.
 */
export function overridesFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.MESH_TCP_HOST) overrides.tcpHost = env.MESH_TCP_HOST;
  if (env.MESH_TCP_PORT) overrides.tcpPort = Number(env.MESH_TCP_PORT);
  if (env.MESH_SERIAL_PORT) overrides.serialPort = env.MESH_SERIAL_PORT;
  if (env.MESH_DATA_DIR) overrides.dataDir = env.MESH_DATA_DIR;
  return overrides;
}

/** `top` wins wherever it sets a value */
export function mergeOverrides(base: ConfigOverrides, top: ConfigOverrides): ConfigOverrides {
  const merged: ConfigOverrides = { ...base };
  if (top.tcpHost !== undefined) merged.tcpHost = top.tcpHost;
  if (top.tcpPort !== undefined) merged.tcpPort = top.tcpPort;
  if (top.serialPort !== undefined) merged.serialPort = top.serialPort;
  if (top.dataDir !== undefined) merged.dataDir = top.dataDir;
  if (top.httpPort !== undefined) merged.httpPort = top.httpPort;
  if (top.mode !== undefined) merged.mode = top.mode;
  if (top.intervalSeconds !== undefined) merged.intervalSeconds = top.intervalSeconds;
  if (top.verbose !== undefined) merged.verbose = top.verbose;
  return merged;
}

/** Layer overrides onto the raw (unvalidated) document. */
export function applyOverrides(raw: Section, overrides: ConfigOverrides): Section {
  const connection = {
    ...section(raw, 'connection'),
    ...defined({ tcpHost: overrides.tcpHost, tcpPort: overrides.tcpPort, serialPort: overrides.serialPort }),
  };
  const sampling = {
    ...section(raw, 'sampling'),
    ...defined({ mode: overrides.mode, intervalSeconds: overrides.intervalSeconds }),
  };
  const history = { ...section(raw, 'history'), ...defined({ dataDir: overrides.dataDir }) };
  const http = section(raw, 'http');
  if (overrides.httpPort !== undefined) {
    http.port = overrides.httpPort;
    http.enabled = true;
  }
  const logging = { ...section(raw, 'logging'), ...defined({ verbose: overrides.verbose }) };

  return { ...raw, connection, sampling, history, http, logging };
}

/** Validate a raw document, turning schema failures into a ConfigError. */
export function buildConfig(raw: unknown, overrides: ConfigOverrides = {}): Config {
  if (raw !== null && raw !== undefined && !isSection(raw)) {
    throw new ConfigError('[Config] Invalid config: top level must be a mapping');
  }
  const merged = applyOverrides(isSection(raw) ? raw : {}, overrides);
  try {
    return validateConfig(merged);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed:\n${formatZodError(err)}`);
    }
    throw err;
  }
}

export interface LoadConfigOptions {
  /** CLI flags; applied after the environment */
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate config from YAML. Throws ConfigError on unreadable
 * YAML or schema violations.
 */
export function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Config {
  const log = getLogger('Config');
  const resolvedPath = configPath ?? path.join(process.cwd(), 'config.yml');
  const overrides = mergeOverrides(overridesFromEnv(options.env), options.overrides ?? {});

  if (!fs.existsSync(resolvedPath)) {
    log.info({ path: resolvedPath }, 'No config file found, using defaults');
    return buildConfig({}, overrides);
  }

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`[Config] Could not parse ${resolvedPath}: ${message}`);
  }

  const config = buildConfig(raw, overrides);
  log.info({ path: resolvedPath }, 'Loaded config');
  return config;
}
