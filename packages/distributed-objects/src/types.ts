import type { LocalStore } from './store/LocalStore.ts';
import type { TypeTag } from './type-tag.ts';

/**
 * Identifies a process of a cluster. Process 1 coordinates; workers are
 * numbered from 2.
 */
export type ProcessId = number;

/**
 * Identifies one stored value within the local store of the process that
 * minted it.
 */
export type ObjectId = string;

/**
 * What a local store reports for a value it has just stored.
 */
export type StoredObject = {
  id: ObjectId;
  type: TypeTag;
};

/**
 * Produces a value to store. Asynchronous producers are awaited.
 */
export type Producer<Value> = () => Value | Promise<Value>;

/**
 * Produces the value to store on a given process.
 */
export type ProcessProducer<Value> = (pid: ProcessId) => Value | Promise<Value>;

/**
 * What a task sees of the process it runs on.
 */
export type ProcessContext = {
  pid: ProcessId;
  store: LocalStore;
};

export type RemoteTask<Result> = (
  context: ProcessContext,
) => Result | Promise<Result>;

/**
 * The services a distributed runtime supplies to distributed objects.
 * Spawning processes, moving closures and values between them, and
 * delivering calls belong to the runtime.
 */
export type Runtime = {
  /**
   * The worker processes, used as the default targets of a bulk create.
   */
  workers(): ProcessId[];

  /**
   * The process this runtime view belongs to.
   */
  myId(): ProcessId;

  /**
   * The local store of the current process.
   */
  localStore(): LocalStore;

  /**
   * Runs a task on a process and resolves with its result. A failure on the
   * remote side rejects the returned promise.
   */
  remoteCall<Result>(pid: ProcessId, task: RemoteTask<Result>): Promise<Result>;

  /**
   * Dispatches a task to a process without waiting for it. Its outcome is not
   * reported to the caller.
   */
  remoteDo(pid: ProcessId, task: RemoteTask<unknown>): void;

  /**
   * Starts every task and resolves with their results, in task order, once all
   * have finished. Rejects with the first failure.
   */
  runConcurrently<Result>(tasks: (() => Promise<Result>)[]): Promise<Result[]>;
};
