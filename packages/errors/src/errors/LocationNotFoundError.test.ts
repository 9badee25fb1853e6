import { describe, it, expect } from 'vitest';

import { LocationNotFoundError } from './LocationNotFoundError.ts';
import { ErrorCode, ErrorSentinel } from '../constants.ts';
import { unmarshalErrorOptions } from '../marshal/unmarshalError.ts';
import type { MarshaledDistributedError } from '../types.ts';

describe('LocationNotFoundError', () => {
  it('creates a LocationNotFoundError with the correct properties', () => {
    const error = new LocationNotFoundError(3);
    expect(error).toBeInstanceOf(LocationNotFoundError);
    expect(error.code).toBe(ErrorCode.LocationNotFound);
    expect(error.message).toBe('Distributed object has no entry on process 3.');
    expect(error.data).toStrictEqual({ pid: 3 });
  });

  it('unmarshals a valid marshaled error', () => {
    const marshaledError: MarshaledDistributedError = {
      [ErrorSentinel]: true,
      message: 'Distributed object has no entry on process 3.',
      code: ErrorCode.LocationNotFound,
      data: { pid: 3 },
      stack: 'stack trace',
    };

    const unmarshaledError = LocationNotFoundError.unmarshal(
      marshaledError,
      unmarshalErrorOptions,
    );
    expect(unmarshaledError).toBeInstanceOf(LocationNotFoundError);
    expect(unmarshaledError.message).toBe(
      'Distributed object has no entry on process 3.',
    );
    expect(unmarshaledError.stack).toBe('stack trace');
  });

  it('throws an error when a pid is not an integer', () => {
    const marshaledError: MarshaledDistributedError = {
      [ErrorSentinel]: true,
      message: 'Distributed object has no entry on process 3.',
      code: ErrorCode.LocationNotFound,
      data: { pid: 'three' },
    };

    expect(() =>
      LocationNotFoundError.unmarshal(marshaledError, unmarshalErrorOptions),
    ).toThrow(
      'At path: data.pid -- Expected an integer, but received: "three"',
    );
  });
});
