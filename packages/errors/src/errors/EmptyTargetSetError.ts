import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

/**
 * Error indicating that a bulk operation was given no processes to act on.
 */
export class EmptyTargetSetError extends BaseError {
  /**
   * Creates a new EmptyTargetSetError.
   *
   * @param operation - The name of the operation that received no targets.
   * @param options - Additional error options including cause and stack.
   */
  constructor(operation: string, options?: ErrorOptionsWithStack) {
    super(ErrorCode.EmptyTargetSet, 'No target processes given.', {
      ...options,
      data: { operation },
    });
  }

  /**
   * A superstruct struct for validating marshaled {@link EmptyTargetSetError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.EmptyTargetSet),
    data: object({
      operation: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledDistributedError} into an {@link EmptyTargetSetError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): EmptyTargetSetError {
    assert(marshaledError, this.struct);
    return new EmptyTargetSetError(
      marshaledError.data.operation,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
