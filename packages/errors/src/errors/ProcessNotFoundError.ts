import { assert, integer, literal, object } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

/**
 * Error indicating that a runtime knows no process with the requested id.
 */
export class ProcessNotFoundError extends BaseError {
  constructor(pid: number, options?: ErrorOptionsWithStack) {
    super(ErrorCode.ProcessNotFound, `Process ${pid} does not exist.`, {
      ...options,
      data: { pid },
    });
  }

  /**
   * A superstruct struct for validating marshaled {@link ProcessNotFoundError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.ProcessNotFound),
    data: object({
      pid: integer(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledDistributedError} into a {@link ProcessNotFoundError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): ProcessNotFoundError {
    assert(marshaledError, this.struct);
    return new ProcessNotFoundError(
      marshaledError.data.pid,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
