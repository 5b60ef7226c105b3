/**
 * @fileoverview Settings Module
 *
 * @example
 * ```typescript
 * import { loadAddonConfig } from './settings/index.js';
 *
 * const config = loadAddonConfig();
 * console.log(config.module_name);
 * ```
 */

export { AddonConfigSchema, type AddonConfig } from './types.js';

export {
  CONFIG_FILE,
  getConfigPath,
  loadAddonConfig,
  parseAddonConfig,
} from './loader.js';
