import { BehaviorSubject, Subscription, type Observable, type Observer } from "rxjs";
import { distinctUntilChanged, filter, map } from "rxjs/operators";
import { createDebugLog, type DebugLogFn, type LogSink } from "./debug";
import { deepEqual, type EqualityFn } from "./equality";
import { ConnectionError } from "./errors";
import type { Dispatch, Store, Unsubscribe } from "./store";

// =============================================================================
// Types
// =============================================================================

export type MapStateToProps<S, P> = (state: S) => P;
export type MapDispatchToActions<Action, A> = (dispatch: Dispatch<Action>) => A;

/** Anything a bound field can be written to: a callback, or an observer such as a Subject. */
export type BindTarget<T> = Partial<Observer<T>> | ((value: T) => void);

export interface ConnectionOptions {
  /** Enable debug logging for this connection */
  debug?: boolean;
  /** Optional name for this connection (used in debug logs) */
  name?: string;
  /** Where debug lines go. Defaults to console.log */
  logger?: LogSink;
  /** Field equality used by bind() and select(). Defaults to deepEqual */
  equals?: EqualityFn<unknown>;
}

// Wrapped so a Props type that admits undefined is still distinguishable from "no props yet"
interface Snapshot<P> {
  readonly props: P;
}

function toNext<T>(target: BindTarget<T>): (value: T) => void {
  if (typeof target === "function") return target;
  return (value) => target.next?.(value);
}

// =============================================================================
// Connection
// =============================================================================

/**
 * Derives `Props` from a store's state and `Actions` from its dispatch
 * function, and forwards single Props fields to UI sinks.
 *
 * @example
 * ```ts
 * const connection = new Connection(
 *   store,
 *   (state: EditorState) => ({ text: state.content, progress: state.progress }),
 *   (dispatch) => ({ setText: (content: string) => dispatch({ type: "setContent", content }) })
 * );
 *
 * connection.connect();
 * connection.bind((props) => props.text, (text) => (label.textContent = text));
 * connection.bind((props) => props.progress, progressLabel$, (p) => `${p * 100}%`);
 * connection.actions.setText("b");
 * connection.disconnect();
 * ```
 */
export class Connection<S, P, A, Action = unknown> {
  readonly actions: A;

  /** Props, emitted only while connected and once a first state has been mapped. */
  readonly props$: Observable<P>;

  private readonly snapshots = new BehaviorSubject<Snapshot<P> | null>(null);
  private readonly bindings = new Subscription();
  private readonly equals: EqualityFn<unknown>;
  private readonly debugLog?: DebugLogFn;
  private current: Snapshot<P> | null = null;
  // Set while snapshots.next() runs; a nested update only records its snapshot here
  private pending: Snapshot<P> | null = null;
  private publishing = false;
  private readonly deliveryErrors: unknown[] = [];
  private unsubscribe: Unsubscribe | null = null;
  private disposed = false;

  constructor(
    private readonly store: Store<S, Action>,
    private readonly mapStateToProps: MapStateToProps<S, P>,
    mapDispatchToActions: MapDispatchToActions<Action, A>,
    options?: ConnectionOptions
  ) {
    this.equals = options?.equals ?? deepEqual;
    this.debugLog = options?.debug
      ? createDebugLog({ connectionName: options.name, sink: options.logger })
      : undefined;

    this.actions = mapDispatchToActions((action) => {
      this.debugLog?.('dispatch', action);
      store.dispatch(action);
    });

    this.props$ = this.snapshots.pipe(
      // Drops the rest of a delivery that disconnect() cut short
      filter((snapshot): snapshot is Snapshot<P> => snapshot !== null && snapshot === this.snapshots.getValue()),
      map((snapshot) => snapshot.props)
    );
  }

  get isConnected(): boolean {
    return this.unsubscribe !== null;
  }

  /** True once at least one state has been mapped to props. */
  get isReady(): boolean {
    return this.current !== null;
  }

  /**
   * The latest props. Stays readable (and unchanged) after disconnect.
   * @throws ConnectionError with code NOT_READY before the first state arrived
   */
  get props(): P {
    if (this.current === null) {
      throw new ConnectionError('NOT_READY', 'props read before the store delivered any state; call connect() first');
    }
    return this.current.props;
  }

  /**
   * Subscribe to the store. The store delivers its current state right away,
   * so props are ready when this returns.
   *
   * Errors thrown by mapStateToProps are not caught: on the first delivery
   * they reach the caller and the connection stays unconnected.
   */
  connect(): void {
    if (this.disposed) {
      throw new ConnectionError('DISPOSED', 'connect() called on a disposed connection');
    }
    if (this.unsubscribe !== null) {
      throw new ConnectionError('ALREADY_CONNECTED', 'connect() called while already connected');
    }

    let released = false;
    let unsubscribe: Unsubscribe;
    try {
      unsubscribe = this.store.subscribe((state) => {
        // A store may call a listener once more while it is being removed
        if (!released) this.update(state);
      });
    } catch (error) {
      released = true;
      if (this.snapshots.getValue() !== null) this.snapshots.next(null);
      throw error;
    }

    this.unsubscribe = () => {
      released = true;
      unsubscribe();
    };
    this.debugLog?.('connect');
  }

  /** Release the store subscription. No-op when not connected. */
  disconnect(): void {
    const unsubscribe = this.unsubscribe;
    if (unsubscribe === null) return;

    this.unsubscribe = null;
    this.pending = null;
    unsubscribe();
    // Bindings stay subscribed but see nothing until the next connect()
    this.snapshots.next(null);
    this.debugLog?.('disconnect');
  }

  /**
   * Disconnect and release every binding. The connection cannot be
   * connected again afterwards.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disconnect();
    this.disposed = true;
    this.bindings.unsubscribe();
    this.debugLog?.('dispose');
  }

  /**
   * One field of the props, deduplicated by field equality.
   *
   * @param selector - Pure accessor from props to the field
   * @param equals - Overrides the connection's field equality
   */
  select<V>(selector: (props: P) => V, equals: EqualityFn<V> = this.equals): Observable<V> {
    return this.props$.pipe(map(selector), distinctUntilChanged(equals));
  }

  /**
   * Forward one props field to a target, skipping consecutive equal values.
   * The optional mapping runs after deduplication.
   *
   * Selector, mapping and target run synchronously with the delivery: an
   * error they throw reaches whoever caused it (dispatch, connect, or this
   * call for the first value) and the binding stays open.
   *
   * The returned subscription is also released by dispose(). Once it is
   * unsubscribed the target receives nothing more.
   *
   * @example
   * ```ts
   * connection.bind((props) => props.text, (text) => (label.textContent = text));
   * connection.bind((props) => props.progress, progress$, (p) => String(p));
   * ```
   */
  bind<V>(selector: (props: P) => V, target: BindTarget<V>): Subscription;
  bind<V, W>(selector: (props: P) => V, target: BindTarget<W>, mapping: (value: V) => W): Subscription;
  bind<V, W>(
    selector: (props: P) => V,
    ...rest: [target: BindTarget<V>] | [target: BindTarget<W>, mapping: (value: V) => W]
  ): Subscription {
    let write: (value: V) => void;
    if (rest.length === 1) {
      write = toNext(rest[0]);
    } else {
      const [target, mapping] = rest;
      const next = toNext(target);
      write = (value) => next(mapping(value));
    }

    const equals: EqualityFn<V> = this.equals;
    let last: { readonly value: V } | null = null;

    const binding = this.props$.subscribe((props) => {
      try {
        const value = selector(props);
        if (last !== null && equals(last.value, value)) return;
        last = { value };
        write(value);
      } catch (error) {
        // Rethrown by the publisher once every binding has had the value
        this.deliveryErrors.push(error);
      }
    });

    this.bindings.add(binding);
    binding.add(() => this.bindings.remove(binding));
    this.debugLog?.('bind', this.disposed ? 'disposed' : this.isConnected ? 'connected' : 'unconnected');

    // Inside a delivery the publisher reports errors itself
    if (this.publishing) return binding;
    try {
      this.throwDeliveryErrors();
    } catch (error) {
      binding.unsubscribe();
      throw error;
    }
    return binding;
  }

  private update(state: S): void {
    const props = this.mapStateToProps(state);
    this.current = { props };
    this.debugLog?.('props', props);

    if (this.publishing) {
      this.pending = this.current;
      return;
    }

    this.publishing = true;
    try {
      let snapshot: Snapshot<P> | null = this.current;
      while (snapshot !== null) {
        this.pending = null;
        this.snapshots.next(snapshot);
        snapshot = this.pending;
      }
    } finally {
      this.publishing = false;
      this.pending = null;
    }
    this.throwDeliveryErrors();
  }

  private throwDeliveryErrors(): void {
    const errors = this.deliveryErrors.splice(0);
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateError(errors, `${errors.length} bindings failed to deliver`);
  }
}
