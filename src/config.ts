/**
 * Configuration loader
 *
 * Reads the YAML config file, validates it against the zod schema and
 * returns the normalized runtime config. A missing file yields the schema
 * defaults (no devices, YAML storage under ./data/connections).
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { AppConfig, validateConfig, formatZodError } from './config-schema';
import { ConfigError } from './errors';
import { getLogger } from './logger';

const log = getLogger('Config');

export const DEFAULT_CONFIG_FILE = 'rf-telemetry.yml';

export function parseConfig(raw: string, source = 'config'): AppConfig {
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (error) {
    throw new ConfigError(`[Config] ${source} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return validateConfig(doc ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new ConfigError(`[Config] Config file not found: ${resolvedPath}`);
    }
    log.warn({ path: resolvedPath }, 'No config file found, using defaults');
    return validateConfig({});
  }

  const config = parseConfig(fs.readFileSync(resolvedPath, 'utf-8'), resolvedPath);
  if (config.storage.type === 'yaml' && !path.isAbsolute(config.storage.dataDir)) {
    config.storage.dataDir = path.resolve(path.dirname(resolvedPath), config.storage.dataDir);
  }
  log.info({ path: resolvedPath, devices: config.devices.length }, 'Config loaded');
  return config;
}
