import { LocalStore, delay } from '@distobj/distributed-objects';
import type {
  ProcessId,
  RemoteTask,
  Runtime,
} from '@distobj/distributed-objects';
import {
  ProcessNotFoundError,
  RemoteExecutionError,
  isMarshaledError,
  marshalError,
  unmarshalError,
} from '@distobj/errors';
import { Logger } from '@distobj/logger';

import { ClusterRuntime } from './ClusterRuntime.ts';
import { resolveClusterConfig } from './config.ts';
import type { ClusterConfig } from './config.ts';
import { makeCounter } from './utils.ts';

export const COORDINATOR_ID: ProcessId = 1;

export type LocalClusterOptions = Partial<ClusterConfig> & {
  logger?: Logger | undefined;
};

type SimulatedProcess = {
  pid: ProcessId;
  store: LocalStore;
  logger: Logger;
};

/**
 * Sends an error across the simulated process boundary: marshals it, encodes
 * it as JSON and restores it on the other side. A failure that cannot be
 * encoded arrives as a plain error with its message, if it has one.
 *
 * @param problem - The value a task threw.
 * @returns The error as the caller's side sees it.
 */
function transmitError(problem: unknown): Error {
  try {
    const error =
      problem instanceof Error ? problem : new Error(String(problem));
    const received: unknown = JSON.parse(JSON.stringify(marshalError(error)));
    return isMarshaledError(received)
      ? unmarshalError(received)
      : new Error(error.message);
  } catch {
    return new Error(
      problem instanceof Error
        ? problem.message
        : 'Unserializable remote failure.',
    );
  }
}

/**
 * A cluster of simulated processes living in the current one. Every process
 * has its own local store and logger; remote calls run the task against the
 * target's store after a turn of the event loop, and only JSON-encoded errors
 * and (by default) cloned results travel back.
 *
 * Process 1 is the coordinator. Workers are numbered from 2 in the order they
 * are added; ids are never reused.
 */
export class LocalCluster {
  readonly #config: ClusterConfig;

  readonly #logger: Logger;

  readonly #processes: Map<ProcessId, SimulatedProcess> = new Map();

  readonly #nextPid = makeCounter();

  /**
   * Creates a new LocalCluster, with the coordinator and `workers` worker
   * processes.
   *
   * @param options - Constructor options; unset settings come from the
   *   environment or the defaults.
   * @param options.logger - Logger instance for debugging and diagnostics.
   *   Defaults to a console logger at the configured `logLevel`.
   */
  constructor({ logger, ...options }: LocalClusterOptions = {}) {
    this.#config = resolveClusterConfig(options);
    this.#logger =
      logger ??
      new Logger({ tags: ['local-cluster'], level: this.#config.logLevel });
    this.#spawn();
    this.addProcesses(this.#config.workers);
  }

  get config(): ClusterConfig {
    return this.#config;
  }

  /**
   * Lists every live process, coordinator included, in ascending order.
   *
   * @returns The process ids.
   */
  processes(): ProcessId[] {
    return [...this.#processes.keys()].sort((left, right) => left - right);
  }

  /**
   * Lists the worker processes in ascending order. A cluster without workers
   * lets the coordinator do the work.
   *
   * @returns The worker ids, or the coordinator's id alone.
   */
  workers(): ProcessId[] {
    const workers = this.processes().filter((pid) => pid !== COORDINATOR_ID);
    return workers.length > 0 ? workers : [COORDINATOR_ID];
  }

  /**
   * Starts new worker processes.
   *
   * @param count - How many to start.
   * @returns The ids of the new processes.
   */
  addProcesses(count: number): ProcessId[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Expected a non-negative integer, received ${count}.`);
    }
    return Array.from({ length: count }, () => this.#spawn());
  }

  /**
   * Stops a worker process, dropping everything its store holds.
   *
   * @param pid - The process to stop.
   * @throws {ProcessNotFoundError} If there is no such process.
   */
  removeProcess(pid: ProcessId): void {
    if (pid === COORDINATOR_ID) {
      throw new Error('The coordinator cannot be removed.');
    }
    const { store } = this.#lookup(pid);
    store.clear();
    this.#processes.delete(pid);
    this.#logger.debug(`removed process ${pid}`);
  }

  /**
   * Stops every process, coordinator included. The cluster cannot be used
   * afterwards.
   */
  shutdown(): void {
    for (const { store } of this.#processes.values()) {
      store.clear();
    }
    this.#processes.clear();
    this.#logger.debug('shut down');
  }

  /**
   * The cluster as seen from one of its processes.
   *
   * @param pid - The process; the coordinator by default.
   * @returns The runtime of `pid`.
   * @throws {ProcessNotFoundError} If there is no such process.
   */
  runtime(pid: ProcessId = COORDINATOR_ID): Runtime {
    this.#lookup(pid);
    return new ClusterRuntime(this, pid);
  }

  /**
   * The local store of a process.
   *
   * @param pid - The process.
   * @returns The store.
   * @throws {ProcessNotFoundError} If there is no such process.
   */
  storeOf(pid: ProcessId): LocalStore {
    return this.#lookup(pid).store;
  }

  /**
   * Runs a task on a process and resolves with its result.
   *
   * @param pid - The process to run on.
   * @param task - The task.
   * @returns The task's result.
   * @throws {ProcessNotFoundError} If there is no such process.
   * @throws {RemoteExecutionError} If the task fails, carrying the failure as
   *   its cause.
   */
  async remoteCall<Result>(
    pid: ProcessId,
    task: RemoteTask<Result>,
  ): Promise<Result> {
    this.#lookup(pid);
    await this.#turn(pid);
    const target = this.#lookup(pid);
    try {
      const result = await task({ pid, store: target.store });
      return this.#config.cloneResults ? structuredClone(result) : result;
    } catch (problem) {
      target.logger.debug('remote call failed', problem);
      throw new RemoteExecutionError(pid, { cause: transmitError(problem) });
    }
  }

  /**
   * Dispatches a task to a process without waiting for it. Failures, an
   * unknown process included, are logged and never reach the caller.
   *
   * @param pid - The process to run on.
   * @param task - The task.
   */
  remoteDo(pid: ProcessId, task: RemoteTask<unknown>): void {
    this.#turn(pid)
      .then(async () => {
        const target = this.#lookup(pid);
        try {
          await task({ pid, store: target.store });
        } catch (problem) {
          target.logger.error('remote task failed', problem);
        }
        return undefined;
      })
      .catch((problem: unknown) => {
        this.#logger.error(`could not run a task on process ${pid}`, problem);
      });
  }

  #spawn(): ProcessId {
    const pid = this.#nextPid();
    const logger = this.#logger.subLogger(`process ${pid}`);
    const store = new LocalStore({ logger });
    this.#processes.set(pid, { pid, store, logger });
    this.#logger.debug(`started process ${pid}`);
    return pid;
  }

  #lookup(pid: ProcessId): SimulatedProcess {
    const target = this.#processes.get(pid);
    if (!target) {
      throw new ProcessNotFoundError(pid);
    }
    return target;
  }

  async #turn(pid: ProcessId): Promise<void> {
    await delay(this.#config.latency[String(pid)] ?? 0);
  }
}
