import { assert, integer, literal, object } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

/**
 * Error indicating that a distributed object holds no entry for a process.
 */
export class LocationNotFoundError extends BaseError {
  /**
   * Creates a new LocationNotFoundError.
   *
   * @param pid - The process the distributed object has no entry for.
   * @param options - Additional error options including cause and stack.
   */
  constructor(pid: number, options?: ErrorOptionsWithStack) {
    super(
      ErrorCode.LocationNotFound,
      `Distributed object has no entry on process ${pid}.`,
      {
        ...options,
        data: { pid },
      },
    );
  }

  /**
   * A superstruct struct for validating marshaled {@link LocationNotFoundError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.LocationNotFound),
    data: object({
      pid: integer(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledDistributedError} into a {@link LocationNotFoundError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): LocationNotFoundError {
    assert(marshaledError, this.struct);
    return new LocationNotFoundError(
      marshaledError.data.pid,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
