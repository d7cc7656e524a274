/**
 * Switchyard StateMachine
 *
 * Extends the event-driven Machine with state-driven transitions:
 * routes keyed by transition alone, transition-keyed handlers, state route
 * mappings and route chains.
 */

import { ChainTracker, type ChainOutcome } from './chain-tracker.js';
import { composeDisposables, weakDisposable } from './disposable.js';
import { HandlerRegistry } from './handler-registry.js';
import { ANY, matches, type Identity } from './identity.js';
import { createContext, Machine } from './machine.js';
import { RouteChain, toRoute, type Route } from './route.js';
import { RoutingTable, passesGuard } from './routing-table.js';
import {
  Transition,
  TransitionChain,
  transitionEquality,
  wildcardClosure,
} from './transition.js';
import type {
  Disposable,
  Guard,
  Handler,
  HandlerOptions,
  MachineOptions,
  RouteMappingOptions,
  RouteOptions,
  RouteQuery,
  SetupFunction,
  StateRouteMapping,
} from './types.js';

interface StateMappingEntry<S> {
  id: number;
  mapping: StateRouteMapping<S>;
}

export interface RouteChainOptions<S, E = never> {
  /** Guard applied to every step, on top of the guards of a RouteChain */
  guard?: Guard<S, E>;

  /** Called when the whole chain has been traversed */
  handler?: Handler<S, E>;
}

/**
 * Machine driven by events and by direct state requests
 *
 * @example
 * ```ts
 * const player = new StateMachine<'stopped' | 'playing' | 'paused'>('stopped', (m) => {
 *   m.addRoute(transition('stopped', 'playing'));
 *   m.addRoute(routeBetween(['playing', 'paused'], ['playing', 'paused']));
 *   m.addHandler(transition(ANY, 'paused'), () => console.log('paused'));
 * });
 *
 * player.tryState('playing'); // true
 * player.tryState('stopped'); // false, no route
 * ```
 */
export class StateMachine<S, E = never> extends Machine<S, E> {
  private transitionRoutes = new RoutingTable<S, E>(this.stateEquality);
  private stateRouteMappings: StateMappingEntry<S>[] = [];
  private transitionHandlers = new HandlerRegistry<Transition<S>, S, E>(
    transitionEquality(this.stateEquality)
  );

  constructor(
    state: S,
    setup?: SetupFunction<StateMachine<S, E>>,
    options: MachineOptions<S, E> = {}
  ) {
    // Fields above only exist once super() returns, so setup runs here
    super(state, undefined, options);
    if (setup) {
      this.configure(setup);
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Check transition routes, state route mappings, then event routes
   *
   * A query naming an event only searches the routes of that event (and of
   * the `ANY` event), like `tryEvent` does.
   */
  hasRoute(query: RouteQuery<S, E>): boolean {
    if (query.event !== undefined) {
      return super.hasRoute(query);
    }

    const { from, to, payload } = query;
    const context = createContext<S, E>(undefined, from, to, payload);

    return (
      this.transitionRoutes.approves(wildcardClosure(from, to), context) ||
      this.stateMappingsApprove(from, to, payload) ||
      super.hasRoute(query)
    );
  }

  /**
   * Whether the current state may move to `to`
   */
  canTryState(to: S, payload?: unknown): boolean {
    return this.hasRoute({ from: this.currentState, to, payload });
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * Request a state directly
   *
   * On success the state is updated, then the handlers keyed by
   * `from => to`, `from => any`, `any => to` and `any => any` run in priority
   * order. On failure nothing changes and the error handlers run.
   *
   * @returns true if the state changed
   */
  tryState(to: S, payload?: unknown): boolean {
    const from = this.currentState;

    if (!this.canTryState(to, payload)) {
      this.fail(undefined, from, payload);
      return false;
    }

    const handlers = this.transitionHandlers.collect(wildcardClosure(from, to));
    this.commit(createContext<S, E>(undefined, from, to, payload), handlers);
    return true;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Allow a state-driven transition
   *
   * `options.handler` runs whenever the route is taken and its guard passes.
   */
  addRoute(target: Transition<S> | Route<S, E>, options: RouteOptions<S, E> = {}): Disposable {
    const added = toRoute(target, options.guard);
    const id = this.nextId();
    this.transitionRoutes.add(added.transition, id, added.guard);

    if (this.options.debug) {
      console.debug('[Switchyard] Route added', {
        routeId: id,
        transition: added.transition.toString(),
        guarded: added.guard !== undefined,
      });
    }

    const { transition } = added;
    const routeDisposable = weakDisposable(this, (machine) =>
      machine.removeTransitionRoute(transition, id)
    );

    const { handler } = options;
    if (!handler) {
      return routeDisposable;
    }

    const handlerDisposable = this.addHandler(transition, (context) => {
      if (passesGuard(added.guard, context)) {
        handler(context);
      }
    });

    return composeDisposables(routeDisposable, handlerDisposable);
  }

  /**
   * Add a handler keyed by transition (state-driven) or by event
   */
  addHandler(
    target: Transition<S> | E | Identity<E>,
    handler: Handler<S, E>,
    options: HandlerOptions = {}
  ): Disposable {
    if (!(target instanceof Transition)) {
      return super.addHandler(target, handler, options);
    }

    const transition: Transition<S> = target;
    const info = this.createHandlerInfo(handler, options);
    const size = this.transitionHandlers.add(transition, info);
    this.traceHandlerAdded('transition', info, size);

    return weakDisposable(this, (machine) => machine.removeTransitionHandler(transition, info.id));
  }

  /**
   * Add a handler for `transition`, whether it was driven by a state
   * request or by any event
   */
  addAnyHandler(
    transition: Transition<S>,
    handler: Handler<S, E>,
    options: HandlerOptions = {}
  ): Disposable {
    const equality = this.stateEquality;

    const stateDriven = this.addHandler(transition, handler, options);
    const eventDriven = this.addHandler(
      ANY,
      (context) => {
        if (
          matches<S>(context.from, transition.from, equality) &&
          matches<S>(context.to, transition.to, equality)
        ) {
          handler(context);
        }
      },
      options
    );

    return composeDisposables(stateDriven, eventDriven);
  }

  /**
   * Add a free-form route for state-driven transitions
   *
   * With `options.handler`, the handler runs for state-driven transitions
   * whose destination is among the mapping's results.
   */
  addStateRouteMapping(
    mapping: StateRouteMapping<S>,
    options: RouteMappingOptions<S, E> = {}
  ): Disposable {
    const id = this.nextId();
    this.stateRouteMappings.push({ id, mapping });

    if (this.options.debug) {
      console.debug('[Switchyard] State route mapping added', {
        mappingId: id,
        totalMappings: this.stateRouteMappings.length,
      });
    }

    const mappingDisposable = weakDisposable(this, (machine) => machine.removeStateRouteMapping(id));

    const { handler } = options;
    if (!handler) {
      return mappingDisposable;
    }

    const equality = this.stateEquality;
    const handlerDisposable = this.addHandler(
      new Transition<S>(ANY, ANY),
      (context) => {
        if (context.event !== undefined) {
          return;
        }
        const destinations = mapping(context.from, context.payload);
        if (destinations?.some((state) => equality.equals(state, context.to))) {
          handler(context);
        }
      },
      { priority: options.priority }
    );

    return composeDisposables(mappingDisposable, handlerDisposable);
  }

  /**
   * Add every route of a chain, plus an optional handler for the whole traversal
   *
   * @example
   * ```ts
   * machine.addRouteChain(chain('cart', 'shipping', 'payment', 'done'), {
   *   handler: () => console.log('checkout complete'),
   * });
   * ```
   */
  addRouteChain(
    target: TransitionChain<S> | RouteChain<S, E>,
    options: RouteChainOptions<S, E> = {}
  ): Disposable {
    const routeChain = this.toRouteChain(target, options.guard);
    const disposables = routeChain.routes.map((step) => this.addRoute(step));

    if (options.handler) {
      disposables.push(this.addChainHandler(routeChain, options.handler));
    }

    return composeDisposables(...disposables);
  }

  /**
   * Run `handler` once every transition of the chain happened in sequence
   *
   * Each step must be requested after the previous one has finished
   * dispatching. A step requested from a handler of the previous step
   * (a nested transition) is seen as a break, and the chain reports failure.
   */
  addChainHandler(
    target: TransitionChain<S> | RouteChain<S, E>,
    handler: Handler<S, E>
  ): Disposable {
    return this.trackChain(target, 'success', handler);
  }

  /**
   * Run `handler` when a started chain is broken by an unexpected transition
   */
  addChainErrorHandler(
    target: TransitionChain<S> | RouteChain<S, E>,
    handler: Handler<S, E>
  ): Disposable {
    return this.trackChain(target, 'failure', handler);
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  handlerCount(): number {
    return super.handlerCount() + this.transitionHandlers.count();
  }

  routeCount(): number {
    return super.routeCount() + this.transitionRoutes.count();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private trackChain(
    target: TransitionChain<S> | RouteChain<S, E>,
    outcome: ChainOutcome,
    handler: Handler<S, E>
  ): Disposable {
    const routeChain = this.toRouteChain(target);
    const tracker = new ChainTracker<S, E>(routeChain, outcome, handler);

    if (this.options.debug) {
      console.debug('[Switchyard] Chain tracked', {
        outcome,
        length: routeChain.length,
      });
    }

    return tracker.install(this);
  }

  private toRouteChain(
    target: TransitionChain<S> | RouteChain<S, E>,
    guard?: Guard<S, E>
  ): RouteChain<S, E> {
    if (target instanceof TransitionChain) {
      return RouteChain.fromTransitions(target, guard);
    }
    return guard ? new RouteChain<S, E>(target.routes.map((step) => toRoute(step, guard))) : target;
  }

  private stateMappingsApprove(from: S, to: S, payload: unknown): boolean {
    return this.stateRouteMappings.some(({ mapping }) => {
      const destinations = mapping(from, payload);
      return destinations !== undefined && destinations.some((state) => this.stateEquality.equals(state, to));
    });
  }

  private removeTransitionRoute(transition: Transition<S>, id: number): void {
    if (this.transitionRoutes.remove(transition, id)) {
      this.traceRemoval('Route removed', id);
    }
  }

  private removeTransitionHandler(transition: Transition<S>, id: number): void {
    if (this.transitionHandlers.remove(transition, id)) {
      this.traceRemoval('Handler removed', id);
    }
  }

  private removeStateRouteMapping(id: number): void {
    const before = this.stateRouteMappings.length;
    this.stateRouteMappings = this.stateRouteMappings.filter((entry) => entry.id !== id);
    if (this.stateRouteMappings.length < before) {
      this.traceRemoval('State route mapping removed', id);
    }
  }
}

/**
 * Factory function to create a StateMachine instance
 */
export const createStateMachine = <S, E = never>(
  state: S,
  setup?: SetupFunction<StateMachine<S, E>>,
  options?: MachineOptions<S, E>
): StateMachine<S, E> => {
  return new StateMachine<S, E>(state, setup, options);
};
