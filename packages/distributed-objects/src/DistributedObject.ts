import {
  EmptyTargetSetError,
  LocationNotFoundError,
  TypeMismatchError,
} from '@distobj/errors';
import { Logger } from '@distobj/logger';

import type { TypeTag } from './type-tag.ts';
import type {
  ObjectId,
  ProcessId,
  ProcessProducer,
  Producer,
  Runtime,
  StoredObject,
} from './types.ts';
import { KeyedMutex } from './utils/KeyedMutex.ts';

type DistributedObjectOptions = {
  runtime: Runtime;
  logger?: Logger | undefined;
};

export type MakeOptions<Value> = DistributedObjectOptions & {
  factory: ProcessProducer<Value>;
  pids?: ProcessId[] | undefined;
};

export type MakeOnOptions<Value> = DistributedObjectOptions & {
  factory: Producer<Value>;
  pid: ProcessId;
};

export type EmptyOptions = DistributedObjectOptions & {
  elementType: TypeTag;
};

type CreationOutcome =
  | { pid: ProcessId; stored: StoredObject }
  | { pid: ProcessId; error: unknown };

const makeDefaultLogger = (): Logger =>
  new Logger({ tags: ['distributed-object'], level: 'info' });

/**
 * Stores a value produced on a process in that process's local store.
 *
 * @param runtime - The runtime to reach the process through.
 * @param pid - The process to store on.
 * @param producer - Produces the value; runs on `pid`.
 * @returns What the store reported for the new value.
 */
async function addObject(
  runtime: Runtime,
  pid: ProcessId,
  producer: Producer<unknown>,
): Promise<StoredObject> {
  if (pid === runtime.myId()) {
    return runtime.localStore().add(producer);
  }
  return runtime.remoteCall(pid, async ({ store }) => store.add(producer));
}

/**
 * Removes a stored value without waiting for the removal. On the current
 * process the store is updated at once.
 *
 * @param runtime - The runtime to reach the process through.
 * @param pid - The process holding the value.
 * @param id - The identifier of the value.
 */
function removeObject(runtime: Runtime, pid: ProcessId, id: ObjectId): void {
  if (pid === runtime.myId()) {
    runtime.localStore().remove(id);
    return;
  }
  runtime.remoteDo(pid, ({ store }) => store.remove(id));
}

/**
 * A typed reference to values of one type stored on several processes, at
 * most one per process. The distributed object holds where its values live
 * (a location table from process to object identifier), never the values
 * themselves.
 *
 * Reading or writing the value of another process goes through the runtime
 * and costs a round trip. Deleting is best-effort: the location table is
 * updated at once and the removal on the remote process is not awaited.
 *
 * @example
 * ```ts
 * const squares = await DistributedObject.make({
 *   runtime,
 *   factory: (pid) => pid * pid,
 *   pids: [2, 3],
 * });
 * await squares.get(3); // 9
 * squares.close();
 * ```
 */
export class DistributedObject<Value> {
  /** The runtime reaching the processes */
  readonly #runtime: Runtime;

  /** Where the values live: the object identifier held on each process */
  readonly #refs: Map<ProcessId, ObjectId>;

  readonly #elementType: TypeTag;

  /** Serializes the writes to each process */
  readonly #writes: KeyedMutex<ProcessId> = new KeyedMutex();

  readonly #logger: Logger;

  private constructor(
    runtime: Runtime,
    elementType: TypeTag,
    refs: Map<ProcessId, ObjectId>,
    logger: Logger,
  ) {
    this.#runtime = runtime;
    this.#elementType = elementType;
    this.#refs = refs;
    this.#logger = logger;
  }

  /**
   * Creates a distributed object referencing nothing yet.
   *
   * @param options - Options bag.
   * @param options.runtime - The runtime reaching the processes.
   * @param options.elementType - The type tag of the values it will hold.
   * @param options.logger - Logger instance for debugging and diagnostics.
   * @returns The empty distributed object.
   */
  static empty<Value>({
    runtime,
    elementType,
    logger,
  }: EmptyOptions): DistributedObject<Value> {
    return new DistributedObject<Value>(
      runtime,
      elementType,
      new Map(),
      logger ?? makeDefaultLogger(),
    );
  }

  /**
   * Creates a value on each of several processes, concurrently, and returns a
   * distributed object referencing them. `factory` runs on each target process
   * with that process's id.
   *
   * All values must have the same type tag, which becomes the element type.
   * If any process fails, or the tags differ, the values already created are
   * removed again before the failure is thrown.
   *
   * @param options - Options bag.
   * @param options.runtime - The runtime reaching the processes.
   * @param options.factory - Produces the value for a process.
   * @param options.pids - The target processes; the runtime's workers by
   *   default. Repeated ids are created once.
   * @param options.logger - Logger instance for debugging and diagnostics.
   * @returns The new distributed object.
   * @throws {EmptyTargetSetError} If there are no target processes.
   * @throws {TypeMismatchError} If the values' type tags differ.
   */
  static async make<Value>({
    runtime,
    factory,
    pids = runtime.workers(),
    logger,
  }: MakeOptions<Value>): Promise<DistributedObject<Value>> {
    const targets = [...new Set(pids)];
    if (targets.length === 0) {
      throw new EmptyTargetSetError('make');
    }
    const log = logger ?? makeDefaultLogger();

    const outcomes = await runtime.runConcurrently(
      targets.map((pid) => async (): Promise<CreationOutcome> => {
        try {
          const stored = await addObject(runtime, pid, async () =>
            factory(pid),
          );
          return { pid, stored };
        } catch (error) {
          return { pid, error };
        }
      }),
    );

    const created: { pid: ProcessId; stored: StoredObject }[] = [];
    const failures: { pid: ProcessId; error: unknown }[] = [];
    for (const outcome of outcomes) {
      if ('stored' in outcome) {
        created.push(outcome);
      } else {
        failures.push(outcome);
      }
    }

    const sweep = (): void => {
      for (const { pid, stored } of created) {
        removeObject(runtime, pid, stored.id);
      }
    };

    const [failure] = failures;
    if (failure) {
      log.warn(
        `creation failed on process ${failure.pid}, removing ${created.length} created objects`,
      );
      sweep();
      throw failure.error;
    }

    const [first] = created;
    const elementType = first?.stored.type ?? 'undefined';
    if (created.some(({ stored }) => stored.type !== elementType)) {
      log.warn(
        `created values differ in type, removing ${created.length} created objects`,
      );
      sweep();
      throw new TypeMismatchError(
        created.map(({ pid, stored }) => ({ pid, type: stored.type })),
      );
    }

    const refs = new Map(created.map(({ pid, stored }) => [pid, stored.id]));
    const object = new DistributedObject<Value>(
      runtime,
      elementType,
      refs,
      log,
    );
    log.debug(
      `created ${elementType} on processes ${object.locations().join(', ')}`,
    );
    return object;
  }

  /**
   * Creates a value on a single process and returns a distributed object
   * referencing it.
   *
   * @param options - Options bag.
   * @param options.runtime - The runtime reaching the processes.
   * @param options.factory - Produces the value; runs on `pid`.
   * @param options.pid - The target process.
   * @param options.logger - Logger instance for debugging and diagnostics.
   * @returns The new distributed object.
   */
  static async makeOn<Value>({
    runtime,
    factory,
    pid,
    logger,
  }: MakeOnOptions<Value>): Promise<DistributedObject<Value>> {
    return DistributedObject.make<Value>({
      runtime,
      factory: async () => factory(),
      pids: [pid],
      logger,
    });
  }

  /**
   * The type tag every value of this distributed object has.
   *
   * @returns The element type.
   */
  get elementType(): TypeTag {
    return this.#elementType;
  }

  /**
   * Lists the processes currently holding a value, in ascending order.
   *
   * @returns The process ids.
   */
  locations(): ProcessId[] {
    return [...this.#refs.keys()].sort((left, right) => left - right);
  }

  has(pid: ProcessId): boolean {
    return this.#refs.has(pid);
  }

  /**
   * Retrieves the value stored on a process. Retrieving the value of another
   * process costs a round trip through the runtime.
   *
   * @param pid - The process to read from; the current process by default.
   * @returns The value.
   * @throws {LocationNotFoundError} If there is no value on `pid`.
   */
  async get(pid: ProcessId = this.#runtime.myId()): Promise<Value> {
    return this.#read(pid, this.#lookup(pid));
  }

  /**
   * Retrieves the value stored on the current process.
   *
   * @returns The value.
   */
  async localPart(): Promise<Value> {
    return this.get();
  }

  /**
   * Retrieves the values stored on several processes, concurrently. Nothing is
   * read unless every process holds a value.
   *
   * @param pids - The processes to read from.
   * @returns The values, in the order of `pids`.
   * @throws {LocationNotFoundError} If any of `pids` holds no value.
   */
  async getMany(...pids: ProcessId[]): Promise<Value[]> {
    const targets = pids.map((pid) => ({ pid, id: this.#lookup(pid) }));
    return this.#runtime.runConcurrently(
      targets.map(({ pid, id }) => async () => this.#read(pid, id)),
    );
  }

  /**
   * Stores the value produced by `factory` on a process, replacing the value
   * held there. `factory` runs on the target process.
   *
   * @param factory - Produces the value.
   * @param pid - The target process; the current process by default.
   */
  async set(
    factory: Producer<Value>,
    pid: ProcessId = this.#runtime.myId(),
  ): Promise<void> {
    await this.#write(new Map([[pid, factory]]));
  }

  /**
   * Stores a value on each of several processes, concurrently. `factory` runs
   * on each target process with that process's id.
   *
   * @param factory - Produces the value for a process.
   * @param pids - The target processes.
   * @throws {EmptyTargetSetError} If `pids` is empty.
   */
  async setMany(
    factory: ProcessProducer<Value>,
    pids: ProcessId[],
  ): Promise<void> {
    if (pids.length === 0) {
      throw new EmptyTargetSetError('setMany');
    }
    await this.#write(new Map(pids.map((pid) => [pid, () => factory(pid)])));
  }

  /**
   * Stores a value on a process, replacing the value held there.
   *
   * @param value - The value.
   * @param pid - The target process; the current process by default.
   */
  async put(
    value: Value,
    pid: ProcessId = this.#runtime.myId(),
  ): Promise<void> {
    await this.set(() => value, pid);
  }

  /**
   * Stores one value on each of several processes, pairing `values` with
   * `pids` by position.
   *
   * @param values - The values.
   * @param pids - The target processes.
   * @throws {EmptyTargetSetError} If `pids` is empty.
   */
  async putMany(values: Value[], pids: ProcessId[]): Promise<void> {
    if (pids.length === 0) {
      throw new EmptyTargetSetError('putMany');
    }
    if (values.length !== pids.length) {
      throw new Error(
        `Expected ${pids.length} values for ${pids.length} processes, received ${values.length}.`,
      );
    }
    const producers = new Map<ProcessId, Producer<Value>>();
    values.forEach((value, index) => {
      const pid = pids[index];
      if (pid !== undefined) {
        producers.set(pid, () => value);
      }
    });
    await this.#write(producers);
  }

  /**
   * Removes the value stored on a process. The location table forgets `pid`
   * at once; the removal on `pid` is not awaited.
   *
   * @param pid - The process.
   * @throws {LocationNotFoundError} If there is no value on `pid`.
   */
  delete(pid: ProcessId): void {
    const id = this.#lookup(pid);
    removeObject(this.#runtime, pid, id);
    this.#refs.delete(pid);
    this.#logger.debug(`deleted ${id} on process ${pid}`);
  }

  /**
   * Removes every value. The distributed object stays usable and can be
   * repopulated with `set`.
   */
  close(): void {
    for (const [pid, id] of this.#refs) {
      removeObject(this.#runtime, pid, id);
    }
    this.#logger.debug(`closed, released ${this.#refs.size} objects`);
    this.#refs.clear();
  }

  #lookup(pid: ProcessId): ObjectId {
    const id = this.#refs.get(pid);
    if (id === undefined) {
      throw new LocationNotFoundError(pid);
    }
    return id;
  }

  async #read(pid: ProcessId, id: ObjectId): Promise<Value> {
    if (pid === this.#runtime.myId()) {
      return this.#runtime.localStore().get<Value>(id);
    }
    return this.#runtime.remoteCall(pid, ({ store }) => store.get<Value>(id));
  }

  /**
   * The single write path: for each process, delete the value held there (if
   * any), then store the new one.
   *
   * @param producers - The producer for each target process.
   */
  async #write(producers: Map<ProcessId, Producer<Value>>): Promise<void> {
    await this.#runtime.runConcurrently(
      [...producers].map(
        ([pid, producer]) =>
          async () =>
            this.#writes.runExclusive(pid, async () => {
              if (this.#refs.has(pid)) {
                this.delete(pid);
              }
              const { id } = await addObject(this.#runtime, pid, producer);
              this.#refs.set(pid, id);
              this.#logger.debug(`stored ${id} on process ${pid}`);
            }),
      ),
    );
  }
}
