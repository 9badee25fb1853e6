import {
  EmptyTargetSetError,
  LocationNotFoundError,
  TypeMismatchError,
} from '@distobj/errors';
import { Logger, makeArrayTransport } from '@distobj/logger';
import type { LogEntry } from '@distobj/logger';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { DistributedObject } from './DistributedObject.ts';
import { TestRuntime } from '../test/test-runtime.ts';

const storedCount = (runtime: TestRuntime, pids: number[]): number[] =>
  pids.map((pid) => runtime.storeOf(pid).size);

describe('DistributedObject', () => {
  let runtime: TestRuntime;

  beforeEach(() => {
    runtime = new TestRuntime();
  });

  describe('make', () => {
    it('creates a value on every target process', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid * 10,
        pids: [2, 3, 4],
      });

      expect(object.locations()).toStrictEqual([2, 3, 4]);
      expect(object.elementType).toBe('number');
      expect(await object.get(2)).toBe(20);
      expect(await object.get(3)).toBe(30);
      expect(await object.get(4)).toBe(40);
      expect(storedCount(runtime, [1, 2, 3, 4])).toStrictEqual([0, 1, 1, 1]);
    });

    it('targets the workers by default', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => `process ${pid}`,
      });

      expect(object.locations()).toStrictEqual([2, 3, 4]);
      expect(object.elementType).toBe('string');
    });

    it('awaits asynchronous factories', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: async (pid) => Promise.resolve([pid, pid]),
        pids: [2],
      });

      expect(await object.get(2)).toStrictEqual([2, 2]);
    });

    it('creates one value per process for repeated targets', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [3, 3, 2],
      });

      expect(object.locations()).toStrictEqual([2, 3]);
      expect(storedCount(runtime, [2, 3])).toStrictEqual([1, 1]);
    });

    it('creates on the current process without a remote call', async () => {
      const remoteCall = vi.spyOn(runtime, 'remoteCall');
      const object = await DistributedObject.make({
        runtime,
        factory: () => 'local',
        pids: [1],
      });

      expect(remoteCall).not.toHaveBeenCalled();
      expect(await object.get()).toBe('local');
      expect(runtime.localStore().size).toBe(1);
    });

    it('throws EmptyTargetSetError without any remote call', async () => {
      const remoteCall = vi.spyOn(runtime, 'remoteCall');
      const runConcurrently = vi.spyOn(runtime, 'runConcurrently');

      await expect(
        DistributedObject.make({ runtime, factory: (pid) => pid, pids: [] }),
      ).rejects.toThrow(EmptyTargetSetError);
      expect(remoteCall).not.toHaveBeenCalled();
      expect(runConcurrently).not.toHaveBeenCalled();
    });

    it('throws EmptyTargetSetError when there are no workers', async () => {
      const lonely = new TestRuntime({ workers: [] });

      await expect(
        DistributedObject.make({ runtime: lonely, factory: (pid) => pid }),
      ).rejects.toThrow('No target processes given.');
    });

    it('throws TypeMismatchError when value types differ', async () => {
      const result = DistributedObject.make<number | string>({
        runtime,
        factory: (pid) => (pid === 3 ? 'three' : pid),
        pids: [2, 3, 4],
      });

      const error = await result.catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error).toHaveProperty('data', {
        types: [
          { pid: 2, type: 'number' },
          { pid: 3, type: 'string' },
          { pid: 4, type: 'number' },
        ],
      });
    });

    it('removes the created values when value types differ', async () => {
      await expect(
        DistributedObject.make<number[] | boolean>({
          runtime,
          factory: (pid) => (pid === 1 ? true : [pid]),
          pids: [1, 2, 3],
        }),
      ).rejects.toThrow(TypeMismatchError);

      expect(storedCount(runtime, [1, 2, 3])).toStrictEqual([0, 0, 0]);
    });

    it('rethrows a failure on a process unchanged', async () => {
      const failure = new Error('factory failed on 3');

      await expect(
        DistributedObject.make({
          runtime,
          factory: (pid) => {
            if (pid === 3) {
              throw failure;
            }
            return pid;
          },
          pids: [2, 3, 4],
        }),
      ).rejects.toBe(failure);
    });

    it('rethrows the first failure in target order', async () => {
      await expect(
        DistributedObject.make({
          runtime: new TestRuntime({ latency: { 4: 0, 2: 20 } }),
          factory: (pid) => {
            throw new Error(`failed on ${pid}`);
          },
          pids: [2, 4],
        }),
      ).rejects.toThrow('failed on 2');
    });

    it('removes the created values when a process fails', async () => {
      await expect(
        DistributedObject.make({
          runtime,
          factory: (pid) => {
            if (pid === 4) {
              throw new Error('factory failed');
            }
            return pid;
          },
          pids: [1, 2, 3, 4],
        }),
      ).rejects.toThrow('factory failed');

      expect(storedCount(runtime, [1, 2, 3, 4])).toStrictEqual([0, 0, 0, 0]);
    });

    it('waits for every process before removing the created values', async () => {
      const slow = new TestRuntime({ latency: { 2: 0, 3: 20 } });

      await expect(
        DistributedObject.make({
          runtime: slow,
          factory: (pid) => {
            if (pid === 2) {
              throw new Error('factory failed');
            }
            return pid;
          },
          pids: [2, 3],
        }),
      ).rejects.toThrow('factory failed');

      expect(storedCount(slow, [2, 3])).toStrictEqual([0, 0]);
    });

    it('logs a warning when creation fails', async () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({
        tags: ['test'],
        level: 'warn',
        transports: [makeArrayTransport(entries)],
      });

      await expect(
        DistributedObject.make({
          runtime,
          factory: (pid) => (pid === 2 ? 'two' : pid),
          pids: [2, 3],
          logger,
        }),
      ).rejects.toThrow(TypeMismatchError);

      expect(entries).toStrictEqual([
        {
          level: 'warn',
          tags: ['test'],
          message: 'created values differ in type, removing 2 created objects',
          data: [],
        },
      ]);
    });
  });

  describe('makeOn', () => {
    it('creates a value on a single process', async () => {
      const object = await DistributedObject.makeOn({
        runtime,
        factory: () => new Map([['key', 'value']]),
        pid: 3,
      });

      expect(object.locations()).toStrictEqual([3]);
      expect(object.elementType).toBe('class:Map');
      expect(await object.get(3)).toStrictEqual(new Map([['key', 'value']]));
    });
  });

  describe('empty', () => {
    it('creates a distributed object without values', async () => {
      const object = DistributedObject.empty<string>({
        runtime,
        elementType: 'string',
      });

      expect(object.locations()).toStrictEqual([]);
      expect(object.elementType).toBe('string');
      await object.put('filled', 2);
      expect(await object.get(2)).toBe('filled');
    });
  });

  describe('get', () => {
    it('reads the current process by default', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [1, 2],
      });

      expect(await object.get()).toBe(1);
      expect(await object.localPart()).toBe(1);
    });

    it('reads other processes through a remote call', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });
      const remoteCall = vi.spyOn(runtime, 'remoteCall');

      expect(await object.get(2)).toBe(2);
      expect(remoteCall).toHaveBeenCalledTimes(1);
      expect(remoteCall).toHaveBeenCalledWith(2, expect.any(Function));
    });

    it('throws LocationNotFoundError for a process without a value', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });

      await expect(object.get(3)).rejects.toThrow(LocationNotFoundError);
      await expect(object.get()).rejects.toThrow(
        'Distributed object has no entry on process 1.',
      );
    });

    it('reports whether a process holds a value', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });

      expect(object.has(2)).toBe(true);
      expect(object.has(3)).toBe(false);
    });
  });

  describe('getMany', () => {
    it('returns values in request order regardless of completion order', async () => {
      const slow = new TestRuntime({ latency: { 2: 0, 3: 10, 4: 30 } });
      const object = await DistributedObject.make({
        runtime: slow,
        factory: (pid) => pid * 100,
        pids: [2, 3, 4],
      });

      expect(await object.getMany(4, 2, 3)).toStrictEqual([400, 200, 300]);
    });

    it('reads nothing unless every process holds a value', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2, 3],
      });
      const remoteCall = vi.spyOn(runtime, 'remoteCall');

      await expect(object.getMany(2, 4)).rejects.toThrow(
        LocationNotFoundError,
      );
      expect(remoteCall).not.toHaveBeenCalled();
    });
  });

  describe('put', () => {
    it('replaces the value on a process', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: () => 'first',
        pids: [2],
      });

      await object.put('second', 2);
      await object.put('third', 2);

      expect(await object.get(2)).toBe('third');
      expect(runtime.storeOf(2).size).toBe(1);
    });

    it('adds a location for a new process', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });

      await object.put(4, 4);

      expect(object.locations()).toStrictEqual([2, 4]);
      expect(await object.get(4)).toBe(4);
    });

    it('writes the current process by default', async () => {
      const object = DistributedObject.empty<number>({
        runtime,
        elementType: 'number',
      });

      await object.put(7);

      expect(object.locations()).toStrictEqual([1]);
      expect(runtime.localStore().size).toBe(1);
    });

    it('serializes concurrent writes to the same process', async () => {
      const object = DistributedObject.empty<string>({
        runtime,
        elementType: 'string',
      });

      await Promise.all([object.put('a', 2), object.put('b', 2)]);

      expect(await object.get(2)).toBe('b');
      expect(runtime.storeOf(2).size).toBe(1);
    });

    it('drops the old value when the new one cannot be produced', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: () => 'old',
        pids: [2],
      });

      await expect(
        object.set(() => {
          throw new Error('no value');
        }, 2),
      ).rejects.toThrow('no value');

      expect(object.has(2)).toBe(false);
      expect(runtime.storeOf(2).size).toBe(0);
    });
  });

  describe('set', () => {
    it('stores the value produced by the factory', async () => {
      const object = DistributedObject.empty<number[]>({
        runtime,
        elementType: 'array',
      });

      await object.set(async () => Promise.resolve([1, 2]), 3);

      expect(await object.get(3)).toStrictEqual([1, 2]);
    });

    it('does not check the type of the new value', async () => {
      const object = await DistributedObject.make<number | string>({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });

      await object.set(() => 'text', 2);

      expect(await object.get(2)).toBe('text');
      expect(object.elementType).toBe('number');
    });
  });

  describe('setMany', () => {
    it('stores a value on every target process', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2, 3],
      });

      await object.setMany((pid) => pid + 1, [3, 4]);

      expect(object.locations()).toStrictEqual([2, 3, 4]);
      expect(await object.getMany(2, 3, 4)).toStrictEqual([2, 4, 5]);
      expect(storedCount(runtime, [2, 3, 4])).toStrictEqual([1, 1, 1]);
    });

    it('throws EmptyTargetSetError for no targets', async () => {
      const object = DistributedObject.empty<number>({
        runtime,
        elementType: 'number',
      });

      await expect(object.setMany((pid) => pid, [])).rejects.toThrow(
        EmptyTargetSetError,
      );
    });
  });

  describe('putMany', () => {
    it('pairs values with processes by position', async () => {
      const object = DistributedObject.empty<string>({
        runtime,
        elementType: 'string',
      });

      await object.putMany(['a', 'b'], [3, 2]);

      expect(await object.getMany(2, 3)).toStrictEqual(['b', 'a']);
    });

    it('throws when the counts differ', async () => {
      const object = DistributedObject.empty<string>({
        runtime,
        elementType: 'string',
      });

      await expect(object.putMany(['a'], [2, 3])).rejects.toThrow(
        'Expected 2 values for 2 processes, received 1.',
      );
      expect(object.locations()).toStrictEqual([]);
    });

    it('throws EmptyTargetSetError for no targets', async () => {
      const object = DistributedObject.empty<string>({
        runtime,
        elementType: 'string',
      });

      await expect(object.putMany([], [])).rejects.toThrow(
        EmptyTargetSetError,
      );
    });
  });

  describe('delete', () => {
    it('forgets the process and removes its value', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => [pid, pid, pid],
        pids: [2, 3, 4],
      });

      object.delete(3);

      expect(object.locations()).toStrictEqual([2, 4]);
      expect(runtime.storeOf(3).size).toBe(0);
      await expect(object.get(3)).rejects.toThrow(LocationNotFoundError);
    });

    it('dispatches the removal without waiting for it', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });
      const remoteDo = vi.spyOn(runtime, 'remoteDo');
      const remoteCall = vi.spyOn(runtime, 'remoteCall');

      object.delete(2);

      expect(remoteDo).toHaveBeenCalledTimes(1);
      expect(remoteDo).toHaveBeenCalledWith(2, expect.any(Function));
      expect(remoteCall).not.toHaveBeenCalled();
    });

    it('removes a value on the current process at once', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [1],
      });
      const remoteDo = vi.spyOn(runtime, 'remoteDo');

      object.delete(1);

      expect(remoteDo).not.toHaveBeenCalled();
      expect(runtime.localStore().size).toBe(0);
    });

    it('throws LocationNotFoundError for a process without a value', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2],
      });

      expect(() => object.delete(3)).toThrow(LocationNotFoundError);
      expect(object.locations()).toStrictEqual([2]);
    });
  });

  describe('close', () => {
    it('removes every value', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [1, 2, 3, 4],
      });

      object.close();

      expect(object.locations()).toStrictEqual([]);
      expect(storedCount(runtime, [1, 2, 3, 4])).toStrictEqual([0, 0, 0, 0]);
      await expect(object.get(2)).rejects.toThrow(LocationNotFoundError);
    });

    it('leaves the distributed object usable', async () => {
      const object = await DistributedObject.make({
        runtime,
        factory: (pid) => pid,
        pids: [2, 3],
      });

      object.close();
      await object.set(() => 9, 3);

      expect(object.locations()).toStrictEqual([3]);
      expect(await object.get(3)).toBe(9);
    });

    it('does nothing on an empty distributed object', () => {
      const object = DistributedObject.empty({ runtime, elementType: 'null' });
      const remoteDo = vi.spyOn(runtime, 'remoteDo');

      object.close();

      expect(remoteDo).not.toHaveBeenCalled();
      expect(object.locations()).toStrictEqual([]);
    });
  });

  it('logs its operations at debug level', async () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({
      tags: ['test'],
      transports: [makeArrayTransport(entries)],
    });
    const object = await DistributedObject.make({
      runtime,
      factory: (pid) => pid,
      pids: [3, 2],
      logger,
    });

    object.close();

    expect(entries.map(({ message }) => message)).toStrictEqual([
      'created number on processes 2, 3',
      'closed, released 2 objects',
    ]);
  });
});
