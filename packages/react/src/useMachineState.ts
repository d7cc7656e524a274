/**
 * useMachineState - React hook that tracks the current state of a machine
 *
 * Re-renders the component after every successful transition.
 */

import { useCallback, useSyncExternalStore } from 'react';
import type { Machine } from 'switchyard';
import { MachineProviderError, useOptionalMachine } from './useMachine.js';

/**
 * Hook returning the current state
 *
 * Reads the machine from context unless one is passed explicitly.
 *
 * @throws {MachineProviderError} If no machine is passed and none is provided
 *
 * @example
 * ```tsx
 * function PlayerStatus() {
 *   const state = useMachineState<Player>();
 *   return <span>{state}</span>;
 * }
 * ```
 *
 * @example Explicit machine
 * ```tsx
 * const state = useMachineState(player);
 * ```
 */
export function useMachineState<S, E = never>(machine?: Machine<S, E>): S {
  const contextMachine = useOptionalMachine<S, E>();
  const target = machine ?? contextMachine;

  if (!target) {
    throw new MachineProviderError(
      'useMachineState needs a machine argument or a surrounding MachineProvider.'
    );
  }

  const subscribe = useCallback(
    (onStoreChange: () => void) => target.subscribe(() => onStoreChange()),
    [target]
  );
  const getSnapshot = () => target.state;

  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
