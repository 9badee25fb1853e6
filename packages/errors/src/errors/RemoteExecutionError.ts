import { assert, integer, literal, object } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

/**
 * Error raised on the calling side when a task failed on a remote process.
 * The remote failure is its `cause`.
 */
export class RemoteExecutionError extends BaseError {
  /**
   * Creates a new RemoteExecutionError.
   *
   * @param pid - The process the task failed on.
   * @param options - Additional error options.
   * @param options.cause - The failure raised by the task on the remote process.
   * @param options.stack - The stack trace of the error.
   */
  constructor(pid: number, options?: ErrorOptionsWithStack) {
    super(
      ErrorCode.RemoteExecutionFailure,
      `Remote execution failed on process ${pid}.`,
      {
        ...options,
        data: { pid },
      },
    );
  }

  /**
   * A superstruct struct for validating marshaled {@link RemoteExecutionError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.RemoteExecutionFailure),
    data: object({
      pid: integer(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledDistributedError} into a {@link RemoteExecutionError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): RemoteExecutionError {
    assert(marshaledError, this.struct);
    return new RemoteExecutionError(
      marshaledError.data.pid,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
