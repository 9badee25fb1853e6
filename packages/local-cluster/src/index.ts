export { ClusterRuntime } from './ClusterRuntime.ts';
export { COORDINATOR_ID, LocalCluster } from './LocalCluster.ts';
export type { LocalClusterOptions } from './LocalCluster.ts';
export {
  ClusterConfigStruct,
  DEFAULT_WORKERS,
  resolveClusterConfig,
} from './config.ts';
export type { ClusterConfig, ClusterEnvironment } from './config.ts';
