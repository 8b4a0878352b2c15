/**
 * Runtime Config Schema
 *
 * Master schema composing every runtime config section. Individual
 * sections stay importable for modules that only need their own domain.
 *
 * @module config/schema/runtime
 */

import type { DebugConfigSchema } from './debug.schema.js';
import type { TokenizerDefaultsSchema } from './tokenizer.schema.js';

import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';
import { DEFAULT_TOKENIZER_DEFAULTS } from './tokenizer.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

/**
 * Runtime configuration schema.
 */
export interface RuntimeConfigSchema {
  /** Tokenizer fallbacks */
  tokenizer: TokenizerDefaultsSchema;

  /** Logging */
  debug: DebugConfigSchema;
}

/** Partial overrides accepted by createRuntimeConfig() */
export interface RuntimeConfigOverrides {
  tokenizer?: Partial<TokenizerDefaultsSchema>;
  debug?: {
    logHistory?: Partial<DebugConfigSchema['logHistory']>;
    logLevel?: Partial<DebugConfigSchema['logLevel']>;
  };
}

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  tokenizer: DEFAULT_TOKENIZER_DEFAULTS,
  debug: DEFAULT_DEBUG_CONFIG,
};

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a runtime configuration with optional overrides.
 *
 * Merges provided overrides with defaults, performing a deep merge
 * on nested objects.
 *
 * @example
 * ```typescript
 * const config = createRuntimeConfig({
 *   tokenizer: { modelMaxLength: 128 },
 *   debug: { logLevel: { defaultLogLevel: 'warn' } },
 * });
 * ```
 */
export function createRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  if (!overrides) {
    return mergeRuntimeConfig(DEFAULT_RUNTIME_CONFIG, {});
  }
  return mergeRuntimeConfig(DEFAULT_RUNTIME_CONFIG, overrides);
}

/**
 * Deep merge runtime config with overrides.
 * Missing nested objects fall back to base; arrays are replaced, not merged.
 */
function mergeRuntimeConfig(
  base: RuntimeConfigSchema,
  overrides: RuntimeConfigOverrides
): RuntimeConfigSchema {
  const tokenizer = { ...base.tokenizer, ...overrides.tokenizer };
  return {
    tokenizer: { ...tokenizer, modelInputNames: [...tokenizer.modelInputNames] },
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides.debug?.logLevel },
    },
  };
}
