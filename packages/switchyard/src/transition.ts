/**
 * Transitions and transition chains
 *
 * A Transition is an ordered (from, to) pair of identities. It is both the
 * request descriptor for a state change and the key of routing and handler
 * tables.
 */

import type { Equality } from './equality.js';
import {
  ANY,
  describeIdentity,
  identityEquality,
  some,
  toIdentity,
  type Identity,
} from './identity.js';
import { InvalidChainError } from './types.js';

export class Transition<S> {
  readonly from: Identity<S>;
  readonly to: Identity<S>;

  constructor(from: S | Identity<S>, to: S | Identity<S>) {
    this.from = toIdentity(from);
    this.to = toIdentity(to);
    Object.freeze(this);
  }

  /**
   * True when neither side is the wildcard
   */
  get isConcrete(): boolean {
    return this.from.kind === 'some' && this.to.kind === 'some';
  }

  /**
   * Append a state, producing a chain `from => to => next`
   */
  connect(next: S | Identity<S>): TransitionChain<S> {
    return new TransitionChain<S>([this.from, this.to, toIdentity(next)]);
  }

  toString(): string {
    return `${describeIdentity(this.from)} => ${describeIdentity(this.to)}`;
  }
}

/**
 * Ordered sequence of at least two states
 */
export class TransitionChain<S> {
  readonly states: readonly Identity<S>[];

  constructor(states: ReadonlyArray<S | Identity<S>>) {
    if (states.length < 2) {
      throw new InvalidChainError(
        `A transition chain needs at least 2 states, got ${states.length}`
      );
    }
    this.states = Object.freeze(states.map((state) => toIdentity(state)));
  }

  /**
   * Adjacent pairs: `a => b => c` yields `[a => b, b => c]`
   */
  get transitions(): Transition<S>[] {
    const result: Transition<S>[] = [];
    for (let i = 0; i < this.states.length - 1; i++) {
      result.push(new Transition<S>(this.states[i], this.states[i + 1]));
    }
    return result;
  }

  connect(next: S | Identity<S>): TransitionChain<S> {
    return new TransitionChain<S>([...this.states, toIdentity(next)]);
  }

  toString(): string {
    return this.states.map(describeIdentity).join(' => ');
  }
}

/**
 * Build a transition from raw values or identities
 *
 * @example
 * ```ts
 * transition('idle', 'loading');
 * transition(ANY, 'error');
 * ```
 */
export const transition = <S>(from: S | Identity<S>, to: S | Identity<S>): Transition<S> =>
  new Transition<S>(from, to);

/**
 * Build a chain from two or more states
 *
 * @example
 * ```ts
 * chain('draft', 'review', 'published').transitions.length; // 2
 * ```
 */
export const chain = <S>(...states: Array<S | Identity<S>>): TransitionChain<S> =>
  new TransitionChain<S>(states);

/**
 * Structural equality over transitions
 */
export const transitionEquality = <S>(equality: Equality<S>): Equality<Transition<S>> => {
  const identities = identityEquality(equality);
  return {
    equals: (a, b) => identities.equals(a.from, b.from) && identities.equals(a.to, b.to),
    hash: (t) => `${identities.hash(t.from)}|${identities.hash(t.to)}`,
  };
};

/**
 * The four table keys a concrete request can be routed through:
 * `from => to`, `from => any`, `any => to`, `any => any`
 */
export const wildcardClosure = <S>(from: S, to: S): Transition<S>[] => {
  const fromId = some(from);
  const toId = some(to);
  return [
    new Transition<S>(fromId, toId),
    new Transition<S>(fromId, ANY),
    new Transition<S>(ANY, toId),
    new Transition<S>(ANY, ANY),
  ];
};
