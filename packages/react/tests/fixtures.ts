import { BehaviorSubject } from "rxjs";
import { Connection, fromObservable, type Dispatch } from "rx-connect";

export interface EditorState {
  content: string;
  progress: number;
}

export type EditorAction =
  | { type: "setContent"; content: string }
  | { type: "setProgress"; progress: number };

function reduce(state: EditorState, action: EditorAction): EditorState {
  switch (action.type) {
    case "setContent":
      return { ...state, content: action.content };
    case "setProgress":
      return { ...state, progress: action.progress };
  }
}

export function createEditor(initial: EditorState = { content: "a", progress: 0 }) {
  const state$ = new BehaviorSubject(initial);
  const store = fromObservable(state$, (action: EditorAction) =>
    state$.next(reduce(state$.getValue(), action))
  );
  const connection = new Connection(
    store,
    (state: EditorState) => ({ text: state.content, progress: state.progress }),
    (dispatch: Dispatch<EditorAction>) => ({
      setContent: (content: string) => dispatch({ type: "setContent", content }),
      setProgress: (progress: number) => dispatch({ type: "setProgress", progress }),
    })
  );
  return { state$, connection };
}

export type EditorProps = { text: string; progress: number };
