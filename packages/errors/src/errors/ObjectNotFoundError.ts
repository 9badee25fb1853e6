import { assert, literal, object, string } from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

/**
 * Error indicating that a local store holds no object under an identifier.
 */
export class ObjectNotFoundError extends BaseError {
  /**
   * Creates a new ObjectNotFoundError.
   *
   * @param objectId - The identifier that was not found.
   * @param options - Additional error options including cause and stack.
   */
  constructor(objectId: string, options?: ErrorOptionsWithStack) {
    super(ErrorCode.ObjectNotFound, 'Object does not exist.', {
      ...options,
      data: { objectId },
    });
  }

  /**
   * A superstruct struct for validating marshaled {@link ObjectNotFoundError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.ObjectNotFound),
    data: object({
      objectId: string(),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledDistributedError} into an {@link ObjectNotFoundError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): ObjectNotFoundError {
    assert(marshaledError, this.struct);
    return new ObjectNotFoundError(
      marshaledError.data.objectId,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
