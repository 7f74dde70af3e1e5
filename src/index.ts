/**
 * understudy
 *
 * Substitute (mock) engine: records intercepted calls, answers them from
 * stubs and verifies how often they happened.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './values/index.js';
export * from './marshaling/index.js';
export * from './invocation/index.js';
export * from './matching/index.js';
export * from './stubbing/index.js';
export * from './verification/index.js';
export * from './dispatch/index.js';
export * from './config/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
