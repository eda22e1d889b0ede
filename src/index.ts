export * from './normalization';
export * from './snapshot';
export * from './config';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
