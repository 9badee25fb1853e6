export { BaseError } from './BaseError.ts';
export type { BaseErrorOptions } from './BaseError.ts';
export { ErrorCode, ErrorSentinel, MarshaledErrorStruct } from './constants.ts';
export type {
  DistributedError,
  ErrorOptionsWithStack,
  MarshaledDistributedError,
  MarshaledError,
} from './types.ts';
export {
  EmptyTargetSetError,
  LocationNotFoundError,
  ObjectNotFoundError,
  ProcessNotFoundError,
  RemoteExecutionError,
  TypeMismatchError,
} from './errors/index.ts';
export type { ProcessValueType } from './errors/index.ts';
export { isMarshaledError } from './marshal/isMarshaledError.ts';
export { marshalError } from './marshal/marshalError.ts';
export { unmarshalError } from './marshal/unmarshalError.ts';
export { isDistributedError } from './utils/isDistributedError.ts';
