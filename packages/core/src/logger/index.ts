export { createLogger, resolveLogLevel, isLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
