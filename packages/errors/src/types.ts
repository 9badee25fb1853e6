import type { Json } from '@metamask/utils';

import type { ErrorCode, ErrorSentinel } from './constants.ts';

/**
 * An error carrying one of the {@link ErrorCode}s and JSON data describing it.
 */
export type DistributedError = {
  code: ErrorCode;
  data: Json | undefined;
} & Error;

export type ErrorOptionsWithStack = {
  cause?: Error | undefined;
  stack?: string | undefined;
};

export type MarshaledError = {
  [ErrorSentinel]: true;
  message: string;
  code?: ErrorCode;
  data?: Json;
  stack?: string;
  cause?: MarshaledError | string;
};

export type MarshaledDistributedError = Omit<
  MarshaledError,
  'code' | 'data'
> & {
  code: ErrorCode;
  data: Json;
};

export type UnmarshalErrorOptions = (
  marshaledError: MarshaledError,
) => ErrorOptionsWithStack;
