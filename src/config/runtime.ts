/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the current session.
 * Call setRuntimeConfig() before constructing tokenizers to change the
 * defaults they fall back to.
 *
 * @module config/runtime
 */

import type { RuntimeConfigSchema, RuntimeConfigOverrides } from './schema/index.js';
import { createRuntimeConfig } from './schema/index.js';
import { applyDebugConfig } from '../debug/config.js';
import { log } from '../debug/log.js';

let runtimeConfig: RuntimeConfigSchema = createRuntimeConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  if (!overrides) {
    return resetRuntimeConfig();
  }

  runtimeConfig = createRuntimeConfig(overrides);
  applyDebugConfig(runtimeConfig.debug);
  log.debug('Config', `Runtime config updated (modelMaxLength=${runtimeConfig.tokenizer.modelMaxLength})`);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig();
  applyDebugConfig(runtimeConfig.debug);
  return runtimeConfig;
}
