import { isMarshaledDistributedError } from './isMarshaledDistributedError.ts';
import { errorClasses } from '../errors/index.ts';
import type { ErrorOptionsWithStack, MarshaledError } from '../types.ts';

/**
 * Unmarshals a {@link MarshaledError} into an {@link Error}. Marshaled errors
 * carrying a known code are restored to their error class.
 *
 * @param marshaledError - The marshaled error to unmarshal.
 * @returns The unmarshaled error.
 */
export function unmarshalError(marshaledError: MarshaledError): Error {
  if (isMarshaledDistributedError(marshaledError)) {
    return errorClasses[marshaledError.code].unmarshal(
      marshaledError,
      unmarshalErrorOptions,
    );
  }

  const { cause, stack } = unmarshalErrorOptions(marshaledError);
  const error = new Error(
    marshaledError.message,
    cause === undefined ? undefined : { cause },
  );

  if (stack !== undefined) {
    error.stack = stack;
  }

  return error;
}

/**
 * Gets the error options from a marshaled error.
 *
 * @param marshaledError - The marshaled error to get the options from.
 * @returns The error options.
 */
export function unmarshalErrorOptions(
  marshaledError: MarshaledError,
): ErrorOptionsWithStack {
  const output: ErrorOptionsWithStack = {};

  if (marshaledError.stack !== undefined) {
    output.stack = marshaledError.stack;
  }

  if (marshaledError.cause) {
    output.cause =
      typeof marshaledError.cause === 'string'
        ? new Error(marshaledError.cause)
        : unmarshalError(marshaledError.cause);
  }

  return output;
}
