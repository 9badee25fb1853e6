import { EmptyTargetSetError } from './EmptyTargetSetError.ts';
import { LocationNotFoundError } from './LocationNotFoundError.ts';
import { ObjectNotFoundError } from './ObjectNotFoundError.ts';
import { ProcessNotFoundError } from './ProcessNotFoundError.ts';
import { RemoteExecutionError } from './RemoteExecutionError.ts';
import { TypeMismatchError } from './TypeMismatchError.ts';
import { ErrorCode } from '../constants.ts';
import type {
  DistributedError,
  MarshaledDistributedError,
  UnmarshalErrorOptions,
} from '../types.ts';

type ErrorClass = {
  unmarshal(
    marshaledError: MarshaledDistributedError,
    unmarshalErrorOptions: UnmarshalErrorOptions,
  ): DistributedError;
};

export const errorClasses = {
  [ErrorCode.EmptyTargetSet]: EmptyTargetSetError,
  [ErrorCode.TypeMismatch]: TypeMismatchError,
  [ErrorCode.LocationNotFound]: LocationNotFoundError,
  [ErrorCode.ObjectNotFound]: ObjectNotFoundError,
  [ErrorCode.ProcessNotFound]: ProcessNotFoundError,
  [ErrorCode.RemoteExecutionFailure]: RemoteExecutionError,
} as const satisfies { [Code in ErrorCode]: ErrorClass };

export {
  EmptyTargetSetError,
  LocationNotFoundError,
  ObjectNotFoundError,
  ProcessNotFoundError,
  RemoteExecutionError,
  TypeMismatchError,
};
export type { ProcessValueType } from './TypeMismatchError.ts';
