/**
 * chronicle-kit: recorded function calls with a composable audit log
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { record, unveil, readLog } from 'chronicle-kit';
 *
 * const add1 = (x: number) => x + 1;
 * const double = (x: number) => x * 2;
 * const out = record(add1)(5).bind(record(double));
 * unveil(out, 'value'); // 12
 * readLog(out);         // ['OK `add1` at ...', 'OK `double` at ...']
 * ```
 */

// Core
export { ConfigManager, getConfig, setConfig, resetConfig, configure, type ConfigOverrides } from './core/config.js';
export { createLogger, getLogger, setLogger, type LogLevel, type LoggerOptions } from './core/logger.js';
export {
  ChronicleError,
  ConfigError,
  InvalidConfigurationError,
  InvalidArgumentError,
} from './core/errors.js';
export {
  ChronicleConfigSchema,
  RecorderOptionsSchema,
  DiffModeSchema,
  StrictnessSchema,
  type ChronicleConfig,
  type DiffMode,
  type DiffResult,
  type Inspector,
  type LogRow,
  type Outcome,
  type RecorderOptions,
  type ResolvedRecorderOptions,
  type Strictness,
} from './core/types.js';

// Maybe
export {
  just,
  nothing,
  isJust,
  isNothing,
  fromMaybe,
  mapMaybe,
  type Maybe,
  type Just,
  type Nothing,
} from './maybe/maybe.js';

// Recorded execution
export * from './chronicle/index.js';

// Utils
export { Stopwatch, formatTimestamp, formatSeconds } from './utils/timer.js';
