import { isLogLevel, logLevels } from '@distobj/logger';
import {
  assert,
  boolean,
  enums,
  integer,
  min,
  object,
  record,
  string,
} from '@metamask/superstruct';
import type { Infer } from '@metamask/superstruct';

const LogLevelStruct = enums(Object.keys(logLevels).filter(isLogLevel));

export const ClusterConfigStruct = object({
  workers: min(integer(), 0),
  logLevel: LogLevelStruct,
  cloneResults: boolean(),
  latency: record(string(), min(integer(), 0)),
});

/**
 * The settings of a local cluster.
 *
 * - `workers`: how many worker processes to start with.
 * - `logLevel`: the minimum level of the cluster's default logger.
 * - `cloneResults`: whether results of remote calls are copied, as sending
 *   them across a process boundary would.
 * - `latency`: milliseconds each remote task waits before running on a
 *   process, by process id.
 */
export type ClusterConfig = Infer<typeof ClusterConfigStruct>;

export type ClusterEnvironment = Record<string, string | undefined>;

export const DEFAULT_WORKERS = 2;

/**
 * Resolves the settings of a local cluster. Explicit options win over the
 * environment (`DISTOBJ_WORKERS`, `DISTOBJ_LOG_LEVEL`), which wins over the
 * defaults.
 *
 * @param options - The explicitly given settings.
 * @param env - The environment to read defaults from.
 * @returns The validated settings.
 * @throws If a setting is invalid.
 */
export function resolveClusterConfig(
  options: Partial<ClusterConfig> = {},
  // eslint-disable-next-line n/no-process-env
  env: ClusterEnvironment = process.env,
): ClusterConfig {
  const { DISTOBJ_WORKERS: workers, DISTOBJ_LOG_LEVEL: logLevel } = env;
  const config = {
    workers:
      options.workers ??
      (workers ? Number(workers) : undefined) ??
      DEFAULT_WORKERS,
    logLevel: options.logLevel ?? (logLevel || 'info'),
    cloneResults: options.cloneResults ?? true,
    latency: options.latency ?? {},
  };
  assert(config, ClusterConfigStruct);
  return config;
}
