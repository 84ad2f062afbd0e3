import { useSyncExternalStore, useMemo, useCallback, useRef } from "react";
import type { Observable } from "rxjs";
import { map } from "rxjs/operators";
import type { Connection } from "rx-connect";

export interface ConnectedValue<P, A> {
  /** Latest props, undefined until the store delivered a first state */
  props: P | undefined;
  actions: A;
}

/**
 * Hook that ties a Connection to the component's lifetime: it connects on
 * mount, disconnects on unmount, and re-renders on every props update.
 *
 * The component owns the connection while mounted; connecting it elsewhere
 * at the same time throws ALREADY_CONNECTED.
 *
 * @example
 * ```tsx
 * const connection = new Connection(store, toProps, toActions);
 *
 * function Editor() {
 *   const { props, actions } = useConnection(connection);
 *   if (!props) return null;
 *   return <input value={props.text} onChange={(e) => actions.setText(e.target.value)} />;
 * }
 * ```
 */
export function useConnection<S, P, A, Action>(
  connection: Connection<S, P, A, Action>
): ConnectedValue<P, A> {
  const subscribe = useCallback(
    (onStoreChange: () => void) => {
      const subscription = connection.props$.subscribe(() => onStoreChange());
      connection.connect();

      return () => {
        subscription.unsubscribe();
        connection.disconnect();
      };
    },
    [connection]
  );

  const getSnapshot = useCallback(
    () => (connection.isReady ? connection.props : undefined),
    [connection]
  );

  const props = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
  return { props, actions: connection.actions };
}

/**
 * Hook to read one props field. Only re-renders when the field changes by
 * the connection's field equality, so unrelated props updates are skipped.
 * The optional mapping runs after deduplication, as in Connection.bind().
 *
 * Does not connect by itself: pair it with useConnection() higher up, or
 * connect the connection elsewhere.
 *
 * @example
 * ```tsx
 * function ProgressLabel() {
 *   const label = useProp(connection, (props) => props.progress, (p) => `${p * 100}%`);
 *   return <span>{label ?? ""}</span>;
 * }
 * ```
 */
export function useProp<S, P, A, Action, V>(
  connection: Connection<S, P, A, Action>,
  selector: (props: P) => V
): V | undefined;
export function useProp<S, P, A, Action, V, W>(
  connection: Connection<S, P, A, Action>,
  selector: (props: P) => V,
  mapping: (value: V) => W
): W | undefined;
export function useProp<S, P, A, Action, V, W>(
  connection: Connection<S, P, A, Action>,
  selector: (props: P) => V,
  mapping?: (value: V) => W
): V | W | undefined {
  const field$ = useMemo((): Observable<V | W> => {
    const selected$ = connection.select(selector);
    return mapping ? selected$.pipe(map(mapping)) : selected$;
  }, [connection, selector, mapping]);

  // Get initial field value
  const getInitialValue = (): V | W | undefined => {
    if (!connection.isReady) return undefined;
    const value = selector(connection.props);
    return mapping ? mapping(value) : value;
  };

  // Ref to hold the current field value - updated by subscription
  const valueRef = useRef<V | W | undefined>(getInitialValue());

  const subscribe = useCallback(
    (onStoreChange: () => void) => {
      const subscription = field$.subscribe((value) => {
        valueRef.current = value;
        onStoreChange();
      });

      return () => subscription.unsubscribe();
    },
    [field$]
  );

  const getSnapshot = useCallback(() => valueRef.current, []);

  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
