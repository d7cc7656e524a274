/**
 * switchyard-react - React bindings for Switchyard
 *
 * Provides a Context provider and hooks for using Switchyard machines in
 * React applications.
 *
 * @example
 * ```tsx
 * import { createStateMachine, transition } from 'switchyard';
 * import { MachineProvider, useMachineState, useStateMachine } from 'switchyard-react';
 *
 * const player = createStateMachine<'stopped' | 'playing'>('stopped', (m) => {
 *   m.addRoute(transition('stopped', 'playing'));
 *   m.addRoute(transition('playing', 'stopped'));
 * });
 *
 * function App() {
 *   return (
 *     <MachineProvider machine={player}>
 *       <Toggle />
 *     </MachineProvider>
 *   );
 * }
 *
 * function Toggle() {
 *   const machine = useStateMachine<'stopped' | 'playing'>();
 *   const state = useMachineState<'stopped' | 'playing'>();
 *   const next = state === 'playing' ? 'stopped' : 'playing';
 *   return <button onClick={() => machine.tryState(next)}>{state}</button>;
 * }
 * ```
 */

export const VERSION = '1.0.0';

// Components
export { MachineProvider, type MachineProviderProps } from './MachineProvider.js';

// Hooks
export { useMachine, useStateMachine, MachineProviderError } from './useMachine.js';
export { useMachineState } from './useMachineState.js';
export { useTransitionHandler, useEventHandler, useErrorHandler } from './useTransitionHandler.js';
