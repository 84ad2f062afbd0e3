/**
 * rx-connect - bind a unidirectional store to RxJS through Props and Actions
 *
 * Core exports:
 * - Connection - derives Props and Actions from a store, binds Props fields to sinks
 * - Connectable, attach() - controller capability and its lifetime
 * - fromObservable(), fromReduxLike() - adapt existing stores to the Store shape
 * - deepEqual() - the default field equality
 */

export {
  Connection,
  type BindTarget,
  type ConnectionOptions,
  type MapDispatchToActions,
  type MapStateToProps,
} from "./connection";
export { attach, isConnectable, type Connectable } from "./connectable";
export { ConnectionError, type ConnectionErrorCode } from "./errors";
export { deepEqual, type EqualityFn } from "./equality";
export { fromObservable, fromReduxLike, type Dispatch, type ReduxLikeStore, type Store, type Unsubscribe } from "./store";
export type { LogSink } from "./debug";
