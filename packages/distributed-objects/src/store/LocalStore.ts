import { ObjectNotFoundError } from '@distobj/errors';
import { Logger } from '@distobj/logger';
import { nanoid } from 'nanoid';

import { typeTagOf } from '../type-tag.ts';
import type { ObjectId, Producer, StoredObject } from '../types.ts';

type LocalStoreOptions = {
  logger?: Logger | undefined;
};

/**
 * The values stored on one process, by identifier. The store owns its values;
 * distributed objects only hold the identifiers.
 *
 * A runtime creates one store per process and tears it down with the process.
 * Every operation changes the map in a single synchronous step, so the
 * process's event loop serializes concurrent adds, removes and reads.
 */
export class LocalStore {
  /** The stored values, by ID */
  readonly #objects: Map<ObjectId, unknown> = new Map();

  /** Logger for outputting messages (such as errors) to the console */
  readonly #logger: Logger;

  /**
   * Creates a new LocalStore instance.
   *
   * @param options - Constructor options.
   * @param options.logger - Logger instance for debugging and diagnostics.
   */
  constructor({ logger }: LocalStoreOptions = {}) {
    this.#logger =
      logger ?? new Logger({ tags: ['local-store'], level: 'info' });
  }

  /**
   * Runs a factory and stores its result under a fresh identifier. The value
   * is inserted only once the factory has settled; a factory that throws
   * stores nothing.
   *
   * @param factory - Produces the value to store.
   * @returns The new identifier and the value's type tag.
   */
  async add(factory: Producer<unknown>): Promise<StoredObject> {
    const value = await factory();
    const id = nanoid();
    const type = typeTagOf(value);
    this.#objects.set(id, value);
    this.#logger.debug(`added ${id} (${type})`);
    return { id, type };
  }

  /**
   * Removes a stored value. Removing an identifier that is not present is not
   * an error.
   *
   * @param id - The identifier of the value.
   * @returns Whether a value was removed.
   */
  remove(id: ObjectId): boolean {
    const removed = this.#objects.delete(id);
    if (removed) {
      this.#logger.debug(`removed ${id}`);
    }
    return removed;
  }

  /**
   * Reads a stored value. The store does not know the types of its values;
   * the caller names the type it stored.
   *
   * @param id - The identifier of the value.
   * @returns The value.
   * @throws {ObjectNotFoundError} If no value is stored under `id`.
   */
  get<Value = unknown>(id: ObjectId): Value {
    if (!this.#objects.has(id)) {
      throw new ObjectNotFoundError(id);
    }
    return this.#objects.get(id) as Value;
  }

  has(id: ObjectId): boolean {
    return this.#objects.has(id);
  }

  get size(): number {
    return this.#objects.size;
  }

  /**
   * Drops every stored value, as when the owning process shuts down.
   */
  clear(): void {
    if (this.#objects.size > 0) {
      this.#logger.debug(`cleared ${this.#objects.size} objects`);
    }
    this.#objects.clear();
  }
}
