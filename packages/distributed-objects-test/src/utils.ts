import { delay } from '@distobj/distributed-objects';
import type { ProcessId } from '@distobj/distributed-objects';
import { LocalCluster } from '@distobj/local-cluster';
import type { LocalClusterOptions } from '@distobj/local-cluster';
import { Logger, makeArrayTransport } from '@distobj/logger';
import type { LogEntry } from '@distobj/logger';

/**
 * Handle the boilerplate of setting up a cluster whose log entries are
 * collected instead of printed.
 *
 * @param options - Cluster options; three workers by default.
 * @returns The cluster and the entries it logs.
 */
export function makeTestCluster(options: LocalClusterOptions = {}): {
  cluster: LocalCluster;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    tags: ['test-cluster'],
    transports: [makeArrayTransport(entries)],
  });
  const cluster = new LocalCluster({ workers: 3, logger, ...options });
  return { cluster, entries };
}

/**
 * Counts what each process of a cluster stores.
 *
 * @param cluster - The cluster.
 * @returns The number of stored values, by process, in process order.
 */
export function storedCounts(cluster: LocalCluster): Record<ProcessId, number> {
  return Object.fromEntries(
    cluster.processes().map((pid) => [pid, cluster.storeOf(pid).size]),
  );
}

/**
 * Waits until dispatched fire-and-forget tasks have run.
 *
 * @param ms - Extra milliseconds to wait, for clusters with latency.
 */
export async function waitForDispatches(ms = 0): Promise<void> {
  await delay(ms + 1);
}
