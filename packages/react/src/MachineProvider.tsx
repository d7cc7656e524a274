/**
 * MachineProvider - React Context Provider for Switchyard
 *
 * Provides a machine instance to child components via React Context.
 * Use useMachine() / useStateMachine() to access it in components.
 */

import { createContext, type ReactNode } from 'react';
import type { Machine } from 'switchyard';

/**
 * React Context for the machine instance.
 * Holds `unknown`: hooks narrow it back with `instanceof`.
 * @internal
 */
export const MachineContext = createContext<unknown>(null);

/**
 * Props for MachineProvider component
 */
export interface MachineProviderProps<S, E = never> {
  /** Machine (or StateMachine) instance to provide to children */
  machine: Machine<S, E>;

  /** Child components that can access the machine */
  children: ReactNode;
}

/**
 * Provider component that makes a machine available to child components
 *
 * @example
 * ```tsx
 * const player = createStateMachine<'stopped' | 'playing'>('stopped', (m) => {
 *   m.addRoute(transition('stopped', 'playing'));
 * });
 *
 * function App() {
 *   return (
 *     <MachineProvider machine={player}>
 *       <PlayButton />
 *     </MachineProvider>
 *   );
 * }
 * ```
 */
export function MachineProvider<S, E = never>({ machine, children }: MachineProviderProps<S, E>) {
  return <MachineContext.Provider value={machine}>{children}</MachineContext.Provider>;
}
