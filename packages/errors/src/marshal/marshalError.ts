import { ErrorSentinel } from '../constants.ts';
import type { MarshaledError } from '../types.ts';
import { isDistributedError } from '../utils/isDistributedError.ts';

/**
 * Marshals an error into a {@link MarshaledError}, a JSON-safe value that can
 * cross a process boundary.
 *
 * @param error - The error to marshal.
 * @returns The marshaled error.
 */
export function marshalError(error: Error): MarshaledError {
  const output: MarshaledError = {
    [ErrorSentinel]: true,
    message: error.message,
  };

  if (error.cause) {
    output.cause =
      error.cause instanceof Error
        ? marshalError(error.cause)
        : JSON.stringify(error.cause);
  }

  if (error.stack) {
    output.stack = error.stack;
  }

  if (isDistributedError(error)) {
    output.code = error.code;
    if (error.data !== undefined) {
      output.data = error.data;
    }
  }

  return output;
}
