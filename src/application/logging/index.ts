/**
 * @module layered-app-kit/application/logging
 */

export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  isLogLevel,
} from './ILogger';

export type { ILogger, LogLevel, ConsoleLoggerOptions } from './ILogger';
