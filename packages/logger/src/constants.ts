/**
 * The log levels, ordered by severity. An entry passes a logger's minimum
 * level when its severity is greater than or equal to the minimum's.
 */
export const logLevels = {
  debug: 0,
  info: 1,
  log: 2,
  warn: 3,
  error: 4,
} as const;
