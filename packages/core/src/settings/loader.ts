/**
 * @fileoverview Add-on Configuration Loader
 *
 * Reads addon.json from the project root and validates it. Unlike user
 * preferences there are no defaults to fall back on: a missing or invalid
 * file is fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PATH_ROOT } from '../constants.js';
import { ConfigError } from '../errors/index.js';
import { LogErrorCodes } from '../logging/error-codes.js';
import { AddonConfigSchema, type AddonConfig } from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const CONFIG_FILE = 'addon.json';

// =============================================================================
// Loading
// =============================================================================

/**
 * Get the path to the configuration file
 */
export function getConfigPath(rootDir: string = PATH_ROOT): string {
  return path.join(rootDir, CONFIG_FILE);
}

/**
 * Validate already-parsed configuration data
 * @param source - Where the data came from, for error messages
 */
export function parseAddonConfig(data: unknown, source = CONFIG_FILE): AddonConfig {
  const result = AddonConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.join('.') || '(root)';
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`, {
      code: LogErrorCodes.CONFIG_INVALID,
      issues,
      context: { source },
    });
  }
  return result.data;
}

/**
 * Load and validate the add-on configuration (synchronous)
 * @param configPath - Optional custom path to the configuration file
 */
export function loadAddonConfig(configPath: string = getConfigPath()): AddonConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const missing = 'code' in cause && cause.code === 'ENOENT';
    throw new ConfigError(
      missing
        ? `Configuration file not found: ${configPath}`
        : `Failed to read configuration from ${configPath}: ${cause.message}`,
      {
        code: missing ? LogErrorCodes.CONFIG_NOT_FOUND : LogErrorCodes.CONFIG_PARSE,
        context: { source: configPath },
        cause,
      }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigError(`Malformed JSON in ${configPath}: ${cause.message}`, {
      code: LogErrorCodes.CONFIG_PARSE,
      context: { source: configPath },
      cause,
    });
  }

  return parseAddonConfig(data, configPath);
}
