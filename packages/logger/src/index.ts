export { Logger } from './logger.ts';
export type {
  LogArgs,
  LogEntry,
  LoggerOptions,
  LogLevel,
  LogMethod,
  Transport,
} from './types.ts';
export { logLevels } from './constants.ts';
export { isLogLevel } from './options.ts';
export { makeConsoleTransport, makeArrayTransport } from './transports.ts';
