import { logLevels } from './constants.ts';
import { makeConsoleTransport } from './transports.ts';
import type {
  LoggerOptions,
  LogLevel,
  ResolvedLoggerOptions,
} from './types.ts';

/**
 * The default options for the logger.
 */
export const DEFAULT_OPTIONS: ResolvedLoggerOptions = {
  transports: [],
  tags: [],
  level: undefined,
};

/**
 * Parses the options for the logger.
 *
 * @param options - The options for the logger.
 * @returns The parsed options.
 */
export const parseOptions = (
  options: LoggerOptions | string | undefined,
): LoggerOptions => {
  // The default case catches whatever is not explicitly handled below.

  switch (typeof options) {
    case 'object':
      if (!options.transports) {
        return { transports: [makeConsoleTransport()], ...options };
      }
      return options;
    case 'string':
      return { tags: [options], transports: [makeConsoleTransport()] };
    case 'undefined':
      return { transports: [makeConsoleTransport()] };
    default:
      throw new Error('Invalid logger options');
  }
};

/**
 * Returns a copy of an array containing only its unique values.
 *
 * @param array - The array to filter.
 * @returns The array, without duplicate values.
 */
export const unique = <Element>(array: Element[]): Element[] => {
  return array.filter(
    (element, index, self) => self.indexOf(element) === index,
  );
};

/**
 * Merges multiple logger options into a single options object. Tags and
 * transports accumulate; the last level given wins.
 *
 * @param options - The options to merge.
 * @returns The merged options.
 */
export const mergeOptions = (
  ...options: LoggerOptions[]
): ResolvedLoggerOptions =>
  options.reduce<ResolvedLoggerOptions>(
    (acc, option) => ({
      transports: unique([...acc.transports, ...(option.transports ?? [])]),
      tags: unique([...acc.tags, ...(option.tags ?? [])]),
      level: option.level ?? acc.level,
    }),
    DEFAULT_OPTIONS,
  );

/**
 * Checks whether a value names a log level.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link LogLevel}.
 */
export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && Object.hasOwn(logLevels, value);

/**
 * Checks whether an entry at `level` passes the minimum level `threshold`.
 *
 * @param level - The level of the entry.
 * @param threshold - The minimum level. No threshold passes everything.
 * @returns Whether the entry should be delivered.
 */
export const isLevelEnabled = (
  level: LogLevel,
  threshold: LogLevel | undefined,
): boolean =>
  threshold === undefined || logLevels[level] >= logLevels[threshold];
