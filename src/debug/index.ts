/**
 * Debug Module - Logging
 *
 * Single source of truth for all logging.
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Usage
 *   import { log, setLogLevel } from '../debug/index.js';
 *
 *   log.info('Tokenizer', 'Vocabulary loaded');
 *   log.verbose('Tokenizer', 'Adding "<ent>" to the vocabulary');
 *   setLogLevel('warn');
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  type LogLevel,
  type LogLevelValue,
  type LogEntry,
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
} from './config.js';

export { log } from './log.js';

export {
  type LogHistoryFilter,
  getLogHistory,
  clearLogHistory,
} from './history.js';
