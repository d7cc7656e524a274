/**
 * Routes and route chains
 *
 * A Route restricts a Transition with an optional guard. The set-based
 * constructors (`routeFrom`, `routeTo`, `routeBetween`) express fan-in and
 * fan-out through a single wildcard transition plus a membership guard
 * instead of enumerating every pair.
 */

import { defaultEquality, type Equality } from './equality.js';
import { ANY, type Identity } from './identity.js';
import { Transition, TransitionChain } from './transition.js';
import { InvalidChainError, type Guard, type TransitionContext } from './types.js';

export interface Route<S, E = never> {
  readonly transition: Transition<S>;

  // Method signature: a route built over a narrower state type still fits
  guard?(context: TransitionContext<S, E>): boolean;
}

/**
 * Build a route from a transition and an optional guard
 */
export const route = <S, E = never>(
  transition: Transition<S>,
  guard?: Guard<S, E>
): Route<S, E> => Object.freeze({ transition, guard });

/**
 * Normalize a registration argument to a route.
 * An extra guard is applied to a bare transition, or combined with the
 * route's own guard (both must pass).
 */
export const toRoute = <S, E = never>(
  target: Transition<S> | Route<S, E>,
  guard?: Guard<S, E>
): Route<S, E> => {
  if (target instanceof Transition) {
    return route(target, guard);
  }
  const own = target.guard;
  if (!guard || !own) {
    return guard ? route(target.transition, guard) : target;
  }
  return route(target.transition, (context) => own(context) && guard(context));
};

const includes = <S>(states: readonly S[], value: S, equality: Equality<S>): boolean =>
  states.some((state) => equality.equals(state, value));

/**
 * `[a, b] => to`: any of the listed states may move to `to`
 *
 * @example
 * ```ts
 * machine.addRoute(routeFrom(['draft', 'review'], 'archived'));
 * ```
 */
export const routeFrom = <S, E = never>(
  froms: readonly S[],
  to: S | Identity<S>,
  equality: Equality<S> = defaultEquality
): Route<S, E> =>
  route(new Transition<S>(ANY, to), (context) => includes(froms, context.from, equality));

/**
 * `from => [a, b]`: `from` may move to any of the listed states
 */
export const routeTo = <S, E = never>(
  from: S | Identity<S>,
  tos: readonly S[],
  equality: Equality<S> = defaultEquality
): Route<S, E> =>
  route(new Transition<S>(from, ANY), (context) => includes(tos, context.to, equality));

/**
 * `[a, b] => [c, d]`: every listed origin may move to every listed destination
 */
export const routeBetween = <S, E = never>(
  froms: readonly S[],
  tos: readonly S[],
  equality: Equality<S> = defaultEquality
): Route<S, E> =>
  route(
    new Transition<S>(ANY, ANY),
    (context) => includes(froms, context.from, equality) && includes(tos, context.to, equality)
  );

/**
 * Ordered group of routes, one per adjacent pair of a chain
 */
export class RouteChain<S, E = never> {
  readonly routes: readonly Route<S, E>[];

  constructor(routes: ReadonlyArray<Route<S, E>>) {
    if (routes.length === 0) {
      throw new InvalidChainError('A route chain needs at least 1 route');
    }
    this.routes = Object.freeze([...routes]);
  }

  /**
   * One route per transition of the chain, all sharing `guard`
   */
  static fromTransitions<S, E = never>(
    chain: TransitionChain<S>,
    guard?: Guard<S, E>
  ): RouteChain<S, E> {
    return new RouteChain<S, E>(chain.transitions.map((t) => route(t, guard)));
  }

  /**
   * Degenerate chain of a single route
   */
  static of<S, E = never>(single: Route<S, E>): RouteChain<S, E> {
    return new RouteChain<S, E>([single]);
  }

  get first(): Route<S, E> {
    return this.routes[0];
  }

  get last(): Route<S, E> {
    return this.routes[this.routes.length - 1];
  }

  get length(): number {
    return this.routes.length;
  }
}
