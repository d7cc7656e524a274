/**
 * Routing Table
 *
 * Stores routes keyed by transition. Several routes may share a transition
 * (fan-in); each entry has its own id so it can be revoked independently.
 */

import type { Equality } from './equality.js';
import { KeyedMap } from './keyed-map.js';
import { transitionEquality, type Transition } from './transition.js';
import type { Guard, TransitionContext } from './types.js';

export interface RouteEntry<S, E = never> {
  id: number;
  guard?: Guard<S, E>;
}

/**
 * Unguarded entries always pass
 */
export const passesGuard = <S, E>(
  guard: Guard<S, E> | undefined,
  context: TransitionContext<S, E>
): boolean => (guard ? guard(context) : true);

export class RoutingTable<S, E = never> {
  private routes: KeyedMap<Transition<S>, RouteEntry<S, E>[]>;

  constructor(equality: Equality<S>) {
    this.routes = new KeyedMap(transitionEquality(equality));
  }

  add(transition: Transition<S>, id: number, guard?: Guard<S, E>): void {
    this.routes.ensure(transition, () => []).push({ id, guard });
  }

  remove(transition: Transition<S>, id: number): boolean {
    const entries = this.routes.get(transition);
    if (!entries) {
      return false;
    }
    const index = entries.findIndex((entry) => entry.id === id);
    if (index === -1) {
      return false;
    }
    entries.splice(index, 1);
    if (entries.length === 0) {
      this.routes.delete(transition);
    }
    return true;
  }

  /**
   * True on the first guard that passes among the entries stored under `keys`
   */
  approves(keys: readonly Transition<S>[], context: TransitionContext<S, E>): boolean {
    for (const key of keys) {
      const entries = this.routes.get(key);
      if (!entries) {
        continue;
      }
      for (const entry of entries) {
        if (passesGuard(entry.guard, context)) {
          return true;
        }
      }
    }
    return false;
  }

  entries(): IterableIterator<[Transition<S>, RouteEntry<S, E>[]]> {
    return this.routes.entries();
  }

  get isEmpty(): boolean {
    return this.routes.size === 0;
  }

  count(): number {
    let total = 0;
    for (const entries of this.routes.values()) {
      total += entries.length;
    }
    return total;
  }
}
