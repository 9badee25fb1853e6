import { is } from '@metamask/superstruct';

import { ErrorCodeStruct } from '../constants.ts';
import type { DistributedError } from '../types.ts';

/**
 * Checks if a value is an error carrying one of the distributed object
 * error codes. Uses the code rather than `instanceof`, so that errors
 * reconstructed from another copy of this package are recognized too.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link DistributedError}.
 */
export function isDistributedError(value: unknown): value is DistributedError {
  return (
    value instanceof Error &&
    'code' in value &&
    is(value.code, ErrorCodeStruct)
  );
}
