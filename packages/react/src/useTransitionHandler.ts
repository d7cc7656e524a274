/**
 * Handler hooks with automatic cleanup
 *
 * Each hook registers a handler on the machine from context when the
 * component mounts and revokes it when the component unmounts or when
 * dependencies change.
 */

import { useEffect } from 'react';
import type { Handler, HandlerOptions, Identity, Transition } from 'switchyard';
import { useMachine, useStateMachine } from './useMachine.js';

/**
 * Handler for state-driven transitions matching `transition`
 *
 * Pass a stable transition (module constant or useMemo) and a stable
 * handler (useCallback) to avoid re-registering on every render.
 *
 * @example
 * ```tsx
 * const INTO_PLAYING = transition<Player>(ANY, 'playing');
 *
 * function Spinner() {
 *   const [spinning, setSpinning] = useState(false);
 *   useTransitionHandler(INTO_PLAYING, useCallback(() => setSpinning(true), []));
 *   return spinning ? <Spin /> : null;
 * }
 * ```
 */
export function useTransitionHandler<S, E = never>(
  transition: Transition<S>,
  handler: Handler<S, E>,
  options?: HandlerOptions
): void {
  const machine = useStateMachine<S, E>();
  const priority = options?.priority;

  useEffect(() => {
    return machine.addHandler(transition, handler, { priority });
  }, [machine, transition, handler, priority]);
}

/**
 * Handler for transitions triggered by `event` (or by any event with `ANY`)
 *
 * @example
 * ```tsx
 * function PushCounter() {
 *   const [count, setCount] = useState(0);
 *   useEventHandler<Door, DoorEvent>('push', useCallback(() => setCount((c) => c + 1), []));
 *   return <span>{count}</span>;
 * }
 * ```
 */
export function useEventHandler<S, E>(
  event: E | Identity<E>,
  handler: Handler<S, E>,
  options?: HandlerOptions
): void {
  const machine = useMachine<S, E>();
  const priority = options?.priority;

  useEffect(() => {
    return machine.addHandler(event, handler, { priority });
  }, [machine, event, handler, priority]);
}

/**
 * Handler for rejected transitions
 */
export function useErrorHandler<S, E = never>(
  handler: Handler<S, E>,
  options?: HandlerOptions
): void {
  const machine = useMachine<S, E>();
  const priority = options?.priority;

  useEffect(() => {
    return machine.addErrorHandler(handler, { priority });
  }, [machine, handler, priority]);
}
