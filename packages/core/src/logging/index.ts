export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
