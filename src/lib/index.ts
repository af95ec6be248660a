export * from './model.js';
export * from './errors.js';
export * from './lcov.js';
export * from './parser.js';
export * from './filter.js';
export * from './delta.js';
export * from './discovery.js';
export * from './orchestrator.js';
export * from './report.js';
export * from './config.js';
export * from './debug-report.js';
export type { ConsoleLoggerOptions, Logger } from './logger.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type * from '../types.js';
