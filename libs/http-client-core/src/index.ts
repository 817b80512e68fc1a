export * from './types';
export * from './errors';
export { createConsoleLogger, parseLogLevel, type LogLevel } from './logger';
