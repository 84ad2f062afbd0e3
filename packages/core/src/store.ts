import type { Observable } from "rxjs";

/** Releases a store subscription. */
export type Unsubscribe = () => void;

export type Dispatch<Action> = (action: Action) => void;

/**
 * The store a Connection reads from and dispatches into.
 *
 * `subscribe` must call the listener with the current state right away,
 * then again on every change, and return a handle that stops further calls.
 */
export interface Store<S, Action> {
  subscribe(listener: (state: S) => void): Unsubscribe;
  dispatch(action: Action): void;
}

/**
 * Shape of a Redux-style store, whose subscribers are only told that
 * something changed and must read the state themselves.
 */
export interface ReduxLikeStore<S, Action> {
  getState(): S;
  subscribe(listener: () => void): Unsubscribe;
  dispatch(action: Action): unknown;
}

/**
 * Adapt an observable of state plus a dispatch function into a Store.
 *
 * The observable has to replay its current value on subscribe, as a
 * `BehaviorSubject` does.
 *
 * @example
 * ```ts
 * const state$ = new BehaviorSubject({ content: "a" });
 * const store = fromObservable(state$, (action: SetContent) =>
 *   state$.next({ content: action.content })
 * );
 * ```
 */
export function fromObservable<S, Action>(
  state$: Observable<S>,
  dispatch: Dispatch<Action>
): Store<S, Action> {
  return {
    subscribe(listener) {
      const subscription = state$.subscribe(listener);
      return () => subscription.unsubscribe();
    },
    dispatch,
  };
}

/**
 * Adapt a Redux-style store. The listener receives the current state
 * immediately, then the new state after each change notification.
 */
export function fromReduxLike<S, Action>(store: ReduxLikeStore<S, Action>): Store<S, Action> {
  return {
    subscribe(listener) {
      let active = true;
      const unsubscribe = store.subscribe(() => {
        if (active) listener(store.getState());
      });
      try {
        listener(store.getState());
      } catch (error) {
        active = false;
        unsubscribe();
        throw error;
      }
      return () => {
        active = false;
        unsubscribe();
      };
    },
    dispatch(action) {
      store.dispatch(action);
    },
  };
}
