/**
 * Adapting existing stores to the Store shape
 */

import { describe, test, expect } from 'vitest';
import { BehaviorSubject } from 'rxjs';
import { Connection, fromObservable, fromReduxLike, type ReduxLikeStore } from '../src';
import { reduce, type EditorAction, type EditorState } from './fixtures';

const initial: EditorState = { content: 'a', progress: 0, tags: [] };

// Redux-style store: listeners take no arguments and are not called on subscribe
function createReduxLikeStore(state: EditorState) {
  const listeners = new Set<() => void>();
  const store: ReduxLikeStore<EditorState, EditorAction> & { listenerCount(): number } = {
    getState: () => state,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispatch(action) {
      state = reduce(state, action);
      listeners.forEach((listener) => listener());
      return action;
    },
    listenerCount: () => listeners.size,
  };
  return store;
}

describe('fromObservable', () => {
  test('delivers the current value and every later one', () => {
    const state$ = new BehaviorSubject(initial);
    const store = fromObservable(state$, (action: EditorAction) => state$.next(reduce(state$.getValue(), action)));
    const received: string[] = [];

    const unsubscribe = store.subscribe((state) => received.push(state.content));
    store.dispatch({ type: 'setContent', content: 'b' });
    unsubscribe();
    store.dispatch({ type: 'setContent', content: 'c' });

    expect(received).toEqual(['a', 'b']);
    expect(state$.getValue().content).toBe('c');
    expect(state$.observed).toBe(false);
  });

  test('drives a connection', () => {
    const state$ = new BehaviorSubject(initial);
    const connection = new Connection(
      fromObservable(state$, (action: EditorAction) => state$.next(reduce(state$.getValue(), action))),
      (state: EditorState) => ({ text: state.content }),
      (dispatch) => ({ setContent: (content: string) => dispatch({ type: 'setContent', content }) })
    );
    const received: string[] = [];
    connection.bind((props) => props.text, (text) => received.push(text));

    connection.connect();
    connection.actions.setContent('b');
    connection.disconnect();

    expect(received).toEqual(['a', 'b']);
    expect(state$.observed).toBe(false);
  });
});

describe('fromReduxLike', () => {
  test('delivers the current state on subscribe', () => {
    const redux = createReduxLikeStore(initial);
    const received: string[] = [];

    fromReduxLike(redux).subscribe((state) => received.push(state.content));

    expect(received).toEqual(['a']);
  });

  test('reads the state after each change and stops on unsubscribe', () => {
    const redux = createReduxLikeStore(initial);
    const store = fromReduxLike(redux);
    const received: string[] = [];

    const unsubscribe = store.subscribe((state) => received.push(state.content));
    store.dispatch({ type: 'setContent', content: 'b' });
    unsubscribe();
    store.dispatch({ type: 'setContent', content: 'c' });

    expect(received).toEqual(['a', 'b']);
    expect(redux.listenerCount()).toBe(0);
  });

  test('does not stay subscribed when the first delivery throws', () => {
    const redux = createReduxLikeStore(initial);

    expect(() =>
      fromReduxLike(redux).subscribe(() => {
        throw new Error('listener failed');
      })
    ).toThrow('listener failed');
    expect(redux.listenerCount()).toBe(0);
  });
});
