/**
 * useMachine - React hooks to access the machine from context
 *
 * Must be used inside a MachineProvider component.
 * Includes SSR safety checks.
 */

import { useContext } from 'react';
import { Machine, StateMachine } from 'switchyard';
import { MachineContext } from './MachineProvider.js';

/**
 * Error thrown when a hook cannot find a suitable machine in context
 */
export class MachineProviderError extends Error {
  constructor(
    message = 'useMachine must be used within a MachineProvider. ' +
      'Wrap your component tree with <MachineProvider machine={machine}>.'
  ) {
    super(message);
    this.name = 'MachineProviderError';
  }
}

/**
 * Check if code is running during server-side rendering
 * @internal
 */
function isSSR(): boolean {
  return typeof window === 'undefined';
}

/**
 * Machine from context, or undefined outside a provider
 * @internal
 */
export function useOptionalMachine<S, E = never>(): Machine<S, E> | undefined {
  const machine = useContext(MachineContext);
  return machine instanceof Machine ? machine : undefined;
}

/**
 * React hook to access the machine instance from context
 *
 * The type arguments are not checked at runtime: they must match the
 * machine given to the provider.
 *
 * @throws {MachineProviderError} If called outside MachineProvider
 *
 * @example
 * ```tsx
 * function DoorButton() {
 *   const door = useMachine<Door, DoorEvent>();
 *   return <button onClick={() => door.tryEvent('push')}>Push</button>;
 * }
 * ```
 */
export function useMachine<S, E = never>(): Machine<S, E> {
  if (isSSR()) {
    if (typeof console !== 'undefined' && console.warn) {
      console.warn(
        '[Switchyard] useMachine called during server-side rendering. ' +
          'Handlers registered during SSR never run. ' +
          'Register them from effects on the client side only.'
      );
    }
  }

  const machine = useOptionalMachine<S, E>();

  if (!machine) {
    throw new MachineProviderError();
  }

  return machine;
}

/**
 * Like useMachine(), for components that need state-driven operations
 *
 * @throws {MachineProviderError} If the provided machine is not a StateMachine
 */
export function useStateMachine<S, E = never>(): StateMachine<S, E> {
  const machine = useMachine<S, E>();

  if (!(machine instanceof StateMachine)) {
    throw new MachineProviderError(
      'useStateMachine needs a StateMachine. ' +
        'Pass one to <MachineProvider machine={machine}>.'
    );
  }

  return machine;
}
