import { isMarshaledError } from './isMarshaledError.ts';
import type { MarshaledDistributedError } from '../types.ts';

/**
 * Checks if a value is a {@link MarshaledDistributedError}, i.e. a marshaled
 * error that carries both a code and data.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link MarshaledDistributedError}.
 */
export function isMarshaledDistributedError(
  value: unknown,
): value is MarshaledDistributedError {
  return (
    isMarshaledError(value) &&
    value.code !== undefined &&
    value.data !== undefined
  );
}
