import type { Struct } from '@metamask/superstruct';
import {
  enums,
  lazy,
  literal,
  object,
  optional,
  string,
  union,
} from '@metamask/superstruct';
import { JsonStruct } from '@metamask/utils';

import type { MarshaledError } from './types.ts';

/**
 * Enum defining all error codes for distributed object errors.
 */
export const ErrorCode = {
  EmptyTargetSet: 'EMPTY_TARGET_SET',
  TypeMismatch: 'TYPE_MISMATCH',
  LocationNotFound: 'LOCATION_NOT_FOUND',
  ObjectNotFound: 'OBJECT_NOT_FOUND',
  ProcessNotFound: 'PROCESS_NOT_FOUND',
  RemoteExecutionFailure: 'REMOTE_EXECUTION_FAILURE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * A sentinel value used to identify marshaled errors.
 */
export const ErrorSentinel = '@@MARSHALED_ERROR';

export const ErrorCodeStruct = enums(Object.values(ErrorCode));

/**
 * Struct to validate marshaled errors.
 */
export const MarshaledErrorStruct = object({
  [ErrorSentinel]: literal(true),
  message: string(),
  code: optional(ErrorCodeStruct),
  data: optional(JsonStruct),
  stack: optional(string()),
  cause: optional(union([string(), lazy(() => MarshaledErrorStruct)])),
}) as Struct<MarshaledError>;

/**
 * Base schema for validating coded error classes during unmarshaling. Each
 * error class narrows `code` and `data`.
 */
export const marshaledErrorSchema = {
  [ErrorSentinel]: literal(true),
  message: string(),
  code: ErrorCodeStruct,
  data: JsonStruct,
  stack: optional(string()),
  cause: optional(union([string(), lazy(() => MarshaledErrorStruct)])),
};
