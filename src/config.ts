/**
 * Configuration loader
 *
 * Reads an optional YAML file with bridge and logging settings, applies
 * BRIDGE_* environment overrides and validates the result.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import {
  type ClientConfigOutput,
  type SessionConfigInput,
  type SessionConfigOutput,
  validateClientConfig,
  validateSessionConfig,
  formatZodError,
} from './config-schema';
import type { LoggerConfig } from './logger';
import { getLogger } from './logger';

const log = getLogger('Config');

/** Bridge session settings; frozen once a client is built from them */
export type SessionConfig = Readonly<SessionConfigOutput>;

/** Runtime config: bridge session plus logging */
export interface ClientConfig {
  bridge: SessionConfig;
  logging: LoggerConfig;
}

export const DEFAULT_CONFIG_FILE = 'bridge.yml';

type Env = Record<string, string | undefined>;

/**
 * Fill defaults and validate session settings supplied in code.
 * Throws on invalid values; the returned object is frozen.
 */
export function resolveSessionConfig(overrides: SessionConfigInput = {}): SessionConfig {
  let validated: SessionConfigOutput;
  try {
    validated = validateSessionConfig(overrides);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
  return Object.freeze(validated);
}

/**
 * Load and validate config from YAML, then apply environment overrides.
 * A missing file yields defaults.
 */
export function loadConfig(configPath?: string, env: Env = process.env): ClientConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  let fileConfig: Record<string, unknown> = {};
  if (fs.existsSync(resolvedPath)) {
    const raw = fs.readFileSync(resolvedPath, 'utf-8');
    const parsed: unknown = parse(raw);
    if (parsed !== null && parsed !== undefined) {
      if (!isRecord(parsed)) {
        throw new Error(`[Config] Invalid config: ${resolvedPath} must contain a mapping`);
      }
      fileConfig = parsed;
    }
  } else {
    log.info({ path: resolvedPath }, 'No config file found, using defaults');
  }

  const fileBridge = fileConfig.bridge ?? {};
  const merged = {
    ...fileConfig,
    bridge: isRecord(fileBridge) ? { ...fileBridge, ...envOverrides(env) } : fileBridge,
  };

  let validated: ClientConfigOutput;
  try {
    validated = validateClientConfig(merged);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  const config: ClientConfig = {
    bridge: Object.freeze(validated.bridge),
    logging: {
      level: validated.logging.level,
      pretty: validated.logging.pretty,
    },
  };

  log.info(
    { host: config.bridge.host, port: config.bridge.port, emulate: config.bridge.emulate },
    'Bridge config loaded',
  );
  return config;
}

/** BRIDGE_* variables; values are left for the schema to reject */
function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.BRIDGE_HOST !== undefined) overrides.host = env.BRIDGE_HOST;
  if (env.BRIDGE_PORT !== undefined) overrides.port = Number(env.BRIDGE_PORT);
  if (env.BRIDGE_TIMEOUT_MS !== undefined) overrides.timeoutMs = Number(env.BRIDGE_TIMEOUT_MS);
  if (env.BRIDGE_DEBUG !== undefined) {
    overrides.debug = ['1', 'true', 'yes'].includes(env.BRIDGE_DEBUG.toLowerCase());
  }
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
