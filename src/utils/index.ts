// Logger
export { logger, Logger, sanitizeString, isLogLevel } from './logger';
export type { LogLevel, LogFormat, LogSink } from './logger';

// Errors
export * from './errors';

// Tagged results
export * from './result';

// Environment helpers
export * from './env';

// Event bus
export * from './event-bus';
