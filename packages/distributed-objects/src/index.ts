export { DistributedObject } from './DistributedObject.ts';
export type {
  EmptyOptions,
  MakeOnOptions,
  MakeOptions,
} from './DistributedObject.ts';
export { LocalStore } from './store/LocalStore.ts';
export { runConcurrently } from './runtime.ts';
export { typeTagOf } from './type-tag.ts';
export type { TypeTag } from './type-tag.ts';
export type {
  ObjectId,
  ProcessContext,
  ProcessId,
  ProcessProducer,
  Producer,
  RemoteTask,
  Runtime,
  StoredObject,
} from './types.ts';
export { delay } from './utils/delay.ts';
export { KeyedMutex } from './utils/KeyedMutex.ts';
