/**
 * Shared Utilities
 * Export barrel for cross-module helpers
 */

export { logger, Logger, LogLevel, parseLogLevel, type LogMeta } from './logger';
export { generateId } from './uuid';
export { sleep, type SleepFn } from './sleep';
export {
  wireString,
  wireNumber,
  wireBoolean,
  wireOptionalString,
  wireArray,
  wireRecord,
} from './schema';
