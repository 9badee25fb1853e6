import { runConcurrently } from '@distobj/distributed-objects';
import type {
  LocalStore,
  ProcessId,
  RemoteTask,
  Runtime,
} from '@distobj/distributed-objects';

import type { LocalCluster } from './LocalCluster.ts';

/**
 * A local cluster as seen from one of its processes.
 */
export class ClusterRuntime implements Runtime {
  readonly #cluster: LocalCluster;

  readonly #pid: ProcessId;

  constructor(cluster: LocalCluster, pid: ProcessId) {
    this.#cluster = cluster;
    this.#pid = pid;
  }

  workers(): ProcessId[] {
    return this.#cluster.workers();
  }

  myId(): ProcessId {
    return this.#pid;
  }

  localStore(): LocalStore {
    return this.#cluster.storeOf(this.#pid);
  }

  async remoteCall<Result>(
    pid: ProcessId,
    task: RemoteTask<Result>,
  ): Promise<Result> {
    return this.#cluster.remoteCall(pid, task);
  }

  remoteDo(pid: ProcessId, task: RemoteTask<unknown>): void {
    this.#cluster.remoteDo(pid, task);
  }

  async runConcurrently<Result>(
    tasks: (() => Promise<Result>)[],
  ): Promise<Result[]> {
    return runConcurrently(tasks);
  }
}
