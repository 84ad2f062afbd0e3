/**
 * In-process stores for the connection tests
 */
import type { Store } from "../src";

export interface EditorState {
  content: string;
  progress: number;
  tags: string[];
}

export type EditorAction =
  | { type: "setContent"; content: string }
  | { type: "setProgress"; progress: number }
  | { type: "setTags"; tags: string[] }
  | { type: "touch" };

export function reduce(state: EditorState, action: EditorAction): EditorState {
  switch (action.type) {
    case "setContent":
      return { ...state, content: action.content };
    case "setProgress":
      return { ...state, progress: action.progress };
    case "setTags":
      return { ...state, tags: action.tags };
    case "touch":
      return { ...state };
  }
}

export interface TestStore<S, Action> extends Store<S, Action> {
  readonly state: S;
  readonly listenerCount: number;
  readonly dispatched: Action[];
  /** Replace the state without going through dispatch */
  setState(state: S): void;
}

/**
 * Synchronous store: calls listeners in subscribe order and lets their
 * exceptions propagate to whoever changed the state.
 */
export function createTestStore<S, Action>(
  initial: S,
  reducer: (state: S, action: Action) => S
): TestStore<S, Action> {
  let state = initial;
  const listeners = new Set<(state: S) => void>();
  const dispatched: Action[] = [];

  const notify = () => {
    for (const listener of [...listeners]) {
      listener(state);
    }
  };

  return {
    get state() {
      return state;
    },
    get listenerCount() {
      return listeners.size;
    },
    dispatched,
    subscribe(listener) {
      listener(state);
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispatch(action) {
      dispatched.push(action);
      state = reducer(state, action);
      notify();
    },
    setState(next) {
      state = next;
      notify();
    },
  };
}

export function createEditorStore(initial: Partial<EditorState> = {}) {
  return createTestStore<EditorState, EditorAction>(
    { content: "a", progress: 0, tags: [], ...initial },
    reduce
  );
}

/** Run fn and return what it threw, or undefined */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
