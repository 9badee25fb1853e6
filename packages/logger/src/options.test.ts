import { describe, expect, it, vi } from 'vitest';

import {
  DEFAULT_OPTIONS,
  isLevelEnabled,
  isLogLevel,
  mergeOptions,
  parseOptions,
} from './options.ts';
import type { Transport } from './types.ts';

const mocks = vi.hoisted(() => ({
  makeConsoleTransport: vi.fn(),
}));

vi.mock('./transports.ts', () => ({
  makeConsoleTransport: mocks.makeConsoleTransport,
}));

describe('parseOptions', () => {
  it('parses an undefined options bag', () => {
    const options = parseOptions(undefined);
    expect(options).toStrictEqual({
      transports: [mocks.makeConsoleTransport()],
    });
  });

  it('parses an empty options bag', () => {
    const options = parseOptions({});
    expect(options).toStrictEqual({
      transports: [mocks.makeConsoleTransport()],
    });
  });

  it('parses an options bag', () => {
    const mockTransport: Transport = vi.fn();
    const options = parseOptions({
      tags: ['test'],
      transports: [mockTransport],
      level: 'warn',
    });
    expect(options).toStrictEqual({
      tags: ['test'],
      transports: [mockTransport],
      level: 'warn',
    });
  });

  it('parses a string', () => {
    const options = parseOptions('test');
    expect(options).toStrictEqual({
      tags: ['test'],
      transports: [mocks.makeConsoleTransport()],
    });
  });

  it.each([[0], [Symbol('test')], [true], [false]])(
    'throws an error if the options are invalid: %s',
    (value) => {
      // @ts-expect-error Invalid options
      expect(() => parseOptions(value)).toThrow(/Invalid logger options/u);
    },
  );
});

describe('mergeOptions', () => {
  it.each([
    { left: ['test'], right: ['sub'], result: ['test', 'sub'] },
    { left: ['test', 'test'], right: ['sub'], result: ['test', 'sub'] },
    {
      left: ['test', 'fizz'],
      right: ['test', 'buzz'],
      result: ['test', 'fizz', 'buzz'],
    },
  ])('merges tags as expected: $left and $right', ({ left, right, result }) => {
    const options = mergeOptions({ tags: left }, { tags: right });
    expect(options.tags).toStrictEqual(result);
  });

  it('defaults to the default options', () => {
    const options = mergeOptions();
    expect(options).toStrictEqual(DEFAULT_OPTIONS);
  });

  const transportA: Transport = vi.fn();
  const transportB: Transport = vi.fn();

  it.each([
    { left: { transports: [] }, right: { transports: [] }, result: [] },
    {
      left: { transports: [transportA] },
      right: { transports: [] },
      result: [transportA],
    },
    {
      left: { transports: [transportA] },
      right: { transports: [transportA] },
      result: [transportA],
    },
    {
      left: { transports: [transportA] },
      right: { transports: [transportB] },
      result: [transportA, transportB],
    },
  ])(
    'merges transports as expected: $left and $right',
    ({ left, right, result }) => {
      const options = mergeOptions(left, right);
      expect(options.transports).toStrictEqual(result);
    },
  );

  it('keeps the last level given', () => {
    expect(mergeOptions({ level: 'info' }, { level: 'error' }).level).toBe(
      'error',
    );
  });

  it('leaves the level unset when no option gives one', () => {
    expect(mergeOptions({ tags: ['a'] }, { tags: ['b'] }).level).toBeUndefined();
  });

  it('inherits the level when a later option has none', () => {
    expect(mergeOptions({ level: 'warn' }, { tags: ['sub'] }).level).toBe(
      'warn',
    );
  });
});

describe('isLogLevel', () => {
  it.each(['debug', 'info', 'log', 'warn', 'error'])(
    'accepts %s',
    (value) => {
      expect(isLogLevel(value)).toBe(true);
    },
  );

  it.each(['verbose', 'toString', '', 3, undefined])('rejects %s', (value) => {
    expect(isLogLevel(value)).toBe(false);
  });
});

describe('isLevelEnabled', () => {
  it.each([
    { level: 'debug', threshold: undefined, result: true },
    { level: 'debug', threshold: 'info', result: false },
    { level: 'info', threshold: 'info', result: true },
    { level: 'error', threshold: 'warn', result: true },
    { level: 'log', threshold: 'warn', result: false },
  ] as const)(
    'is $result for $level at threshold $threshold',
    ({ level, threshold, result }) => {
      expect(isLevelEnabled(level, threshold)).toBe(result);
    },
  );
});
