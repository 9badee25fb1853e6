import {
  array,
  assert,
  integer,
  literal,
  object,
  string,
} from '@metamask/superstruct';

import { BaseError } from '../BaseError.ts';
import { marshaledErrorSchema, ErrorCode } from '../constants.ts';
import type {
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

/**
 * The type a single process reported for the value it produced.
 */
export type ProcessValueType = {
  pid: number;
  type: string;
};

/**
 * Error indicating that the values produced for one distributed object on
 * different processes do not share a runtime type.
 */
export class TypeMismatchError extends BaseError {
  /**
   * Creates a new TypeMismatchError.
   *
   * @param types - The type reported by every process, in request order.
   * @param options - Additional error options including cause and stack.
   */
  constructor(types: ProcessValueType[], options?: ErrorOptionsWithStack) {
    super(
      ErrorCode.TypeMismatch,
      'Values produced on different processes have different types.',
      {
        ...options,
        data: { types: types.map(({ pid, type }) => ({ pid, type })) },
      },
    );
  }

  /**
   * A superstruct struct for validating marshaled {@link TypeMismatchError} instances.
   */
  public static struct = object({
    ...marshaledErrorSchema,
    code: literal(ErrorCode.TypeMismatch),
    data: object({
      types: array(object({ pid: integer(), type: string() })),
    }),
  });

  /**
   * Unmarshals a {@link MarshaledDistributedError} into a {@link TypeMismatchError}.
   *
   * @param marshaledError - The marshaled error to unmarshal.
   * @param unmarshalErrorOptions - The function to unmarshal the error options.
   * @returns The unmarshaled error.
   */
  public static unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): TypeMismatchError {
    assert(marshaledError, this.struct);
    return new TypeMismatchError(
      marshaledError.data.types,
      unmarshalErrorOptions(marshaledError),
    );
  }
}
