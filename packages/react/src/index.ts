/**
 * rx-connect-react - React bindings for rx-connect
 *
 * @example
 * ```tsx
 * import { Connection } from 'rx-connect';
 * import { useConnection, useProp } from 'rx-connect-react';
 *
 * const connection = new Connection(store, toProps, toActions);
 *
 * function Editor() {
 *   const { props, actions } = useConnection(connection);
 *   return <button onClick={() => actions.setText('b')}>{props?.text}</button>;
 * }
 *
 * function Progress() {
 *   const progress = useProp(connection, (props) => props.progress);
 *   return <span>{progress}</span>;
 * }
 * ```
 */

export { useConnection, useProp } from "./hooks";

export type { ConnectedValue } from "./hooks";
