/**
 * Schema Index
 *
 * Re-exports all schema definitions for easy importing.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - *Overrides: Partial input merged over defaults
 *
 * @module config/schema
 */

// =============================================================================
// Debug Schema
// =============================================================================
export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

// =============================================================================
// Tokenizer Schema
// =============================================================================
export {
  type SequenceSide,
  type ModelInputName,
  type TokenizerDefaultsSchema,
  DEFAULT_TOKENIZER_DEFAULTS,
} from './tokenizer.schema.js';

// =============================================================================
// Runtime Schema
// =============================================================================
export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
} from './runtime.schema.js';
