/**
 * Switchyard - Typed state machine routing engine
 *
 * - Routes keyed by event and by (from, to) transition
 * - `ANY` wildcard on either side of a transition, or for the event
 * - Guards, free-form route mappings and route chains
 * - Priority-ordered synchronous handler dispatch
 * - Revocation handles that never keep a machine alive
 */

export const VERSION = '1.0.0';

// Core exports
export { Machine, createMachine } from './machine.js';
export { StateMachine, createStateMachine } from './state-machine.js';
export type { RouteChainOptions } from './state-machine.js';

// Model
export { ANY, some, isIdentity, isAny, toIdentity, rawValue, matches } from './identity.js';
export type { Identity, SomeIdentity, AnyIdentity } from './identity.js';
export { Transition, TransitionChain, transition, chain } from './transition.js';
export { RouteChain, route, routeFrom, routeTo, routeBetween } from './route.js';
export type { Route } from './route.js';

// Equality
export { defaultEquality, jsonEquality } from './equality.js';
export type { Equality } from './equality.js';

// Chain tracking
export {
  ChainTracker,
  CHAIN_STEP_PRIORITY,
  CHAIN_OBSERVE_PRIORITY,
  CHAIN_COMPLETE_PRIORITY,
} from './chain-tracker.js';
export type { ChainOutcome, ChainProgress, ChainRegistrar } from './chain-tracker.js';

// Export all types and interfaces
export type {
  TransitionContext,
  Guard,
  Handler,
  RouteMapping,
  StateRouteMapping,
  RouteQuery,
  Disposable,
  SetupFunction,
  HandlerOptions,
  RouteOptions,
  RouteMappingOptions,
  StateListener,
  MachineOptions,
  ExecutionError,
} from './types.js';

export { DEFAULT_PRIORITY } from './types.js';

// Export error classes
export { InvalidChainError, HandlerExecutionError } from './types.js';
