/**
 * Type definitions for Switchyard
 *
 * Callback signatures, registration options, engine options and error
 * classes shared by the routing table, the handler registry and both
 * machine flavours.
 */

import type { Equality } from './equality.js';

// ============================================================================
// Transition Context
// ============================================================================

/**
 * Read-only snapshot handed to guards and handlers
 * @template S - State type
 * @template E - Event type
 */
export interface TransitionContext<S, E = never> {
  /** Event that triggered the change (undefined for state-driven transitions) */
  readonly event: E | undefined;

  /** State before the transition */
  readonly from: S;

  /** State after the transition (the unchanged state for failed transitions) */
  readonly to: S;

  /** Free-form data passed by the caller */
  readonly payload: unknown;
}

/**
 * Guard - returns true to allow a route
 */
export type Guard<S, E = never> = (context: TransitionContext<S, E>) => boolean;

/**
 * Handler - observer invoked after a successful (or failed) transition
 */
export type Handler<S, E = never> = (context: TransitionContext<S, E>) => void;

/**
 * Free-form route for transitions too irregular for transition + guard
 * @returns The preferred destination, or undefined to decline
 */
export type RouteMapping<S, E = never> = (
  event: E | undefined,
  from: S,
  payload: unknown
) => S | undefined;

/**
 * Free-form route for state-driven transitions
 * @returns Every acceptable destination, or undefined to decline
 */
export type StateRouteMapping<S> = (from: S, payload: unknown) => readonly S[] | undefined;

/**
 * Route lookup request for `hasRoute()`
 */
export interface RouteQuery<S, E = never> {
  /** Triggering event; omit to search the routes of every event */
  event?: E;
  from: S;
  to: S;
  payload?: unknown;
}

/**
 * Revocation handle returned by every registration.
 * Calling it removes exactly that registration; later calls do nothing.
 */
export type Disposable = () => void;

/**
 * Setup callback run against a freshly built (or existing) machine
 */
export type SetupFunction<M> = (machine: M) => void;

// ============================================================================
// Registration Options
// ============================================================================

/**
 * Default dispatch priority. Lower values run earlier.
 */
export const DEFAULT_PRIORITY = 100;

export interface HandlerOptions {
  /** Dispatch priority - lower values run earlier (default: 100) */
  priority?: number;
}

export interface RouteOptions<S, E = never> {
  /** Guard applied to every transition being registered */
  guard?: Guard<S, E>;

  /** Handler invoked when one of the registered routes is taken */
  handler?: Handler<S, E>;
}

export interface RouteMappingOptions<S, E = never> extends HandlerOptions {
  /** Handler invoked when a transition lands on the mapping's preferred destination */
  handler?: Handler<S, E>;
}

/**
 * Internal handler entry stored in a dispatch list
 * @internal
 */
export interface HandlerInfo<S, E = never> {
  /** Unique key within the owning machine */
  id: number;

  /** Dispatch priority */
  priority: number;

  /** The handler function */
  callback: Handler<S, E>;

  /** Cleared on removal so an in-flight dispatch skips the entry */
  active: boolean;
}

// ============================================================================
// Machine Options
// ============================================================================

/**
 * State observer notified after every successful transition
 */
export type StateListener<S> = (current: S, previous: S) => void;

/**
 * Options for creating a machine
 */
export interface MachineOptions<S, E = never> {
  /** Equality used for states (default: Object.is / reference identity) */
  stateEquality?: Equality<S>;

  /** Equality used for events (default: Object.is / reference identity) */
  eventEquality?: Equality<E>;

  /** Keep dispatching when a handler throws (default: true) */
  errorBoundary?: boolean;

  /** Called for each handler exception while errorBoundary is on */
  onError?: (error: Error, context: TransitionContext<S, E>) => void;

  /** Debug mode - logs registrations and transitions */
  debug?: boolean;

  /** Warn when a single handler list grows beyond this size (default: Infinity) */
  maxHandlers?: number;
}

/**
 * Error collected while dispatching handlers
 */
export interface ExecutionError<S, E = never> {
  handlerId: number;
  error: Error;
  context: TransitionContext<S, E>;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when a transition chain or route chain is too short to describe a sequence
 */
export class InvalidChainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidChainError';
  }
}

/**
 * Wraps non-Error values thrown by handlers
 */
export class HandlerExecutionError extends Error {
  constructor(
    public readonly handlerId: number,
    public readonly thrown: unknown
  ) {
    super(`Handler ${handlerId} threw a non-error value: ${String(thrown)}`);
    this.name = 'HandlerExecutionError';
  }
}
