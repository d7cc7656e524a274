/**
 * Identity - a concrete state/event value or the `ANY` wildcard
 *
 * Two equalities coexist:
 * - strict (`identityEquality`): used for table keys, `ANY` equals only `ANY`
 * - matching (`matches`): `ANY` as a pattern accepts every candidate
 *
 * Route resolution looks up exact keys with strict equality and then tries
 * the wildcard keys explicitly. Conflating the two would make `ANY` routes
 * unreachable.
 */

import type { Equality } from './equality.js';

export interface SomeIdentity<T> {
  readonly kind: 'some';
  readonly value: T;
}

export interface AnyIdentity {
  readonly kind: 'any';
}

export type Identity<T> = SomeIdentity<T> | AnyIdentity;

/**
 * Registry of constructed identities, so raw host values shaped like
 * `{ kind: 'any' }` are never mistaken for a wildcard.
 */
const identities = new WeakSet<object>();

/**
 * The wildcard identity
 */
export const ANY: AnyIdentity = Object.freeze({ kind: 'any' as const });
identities.add(ANY);

/**
 * Wrap a concrete value
 */
export const some = <T>(value: T): SomeIdentity<T> => {
  const identity: SomeIdentity<T> = Object.freeze({ kind: 'some' as const, value });
  identities.add(identity);
  return identity;
};

export const isIdentity = <T>(value: T | Identity<T>): value is Identity<T> =>
  typeof value === 'object' && value !== null && identities.has(value);

export const isAny = <T>(identity: Identity<T>): identity is AnyIdentity => identity.kind === 'any';

/**
 * Wrap a raw value, passing identities through untouched
 */
export const toIdentity = <T>(value: T | Identity<T>): Identity<T> =>
  isIdentity(value) ? value : some(value);

/**
 * The wrapped value, or undefined for `ANY`
 */
export const rawValue = <T>(identity: Identity<T>): T | undefined =>
  identity.kind === 'some' ? identity.value : undefined;

/**
 * Strict equality over identities, derived from the value equality
 */
export const identityEquality = <T>(equality: Equality<T>): Equality<Identity<T>> => ({
  equals: (a, b) => {
    if (a.kind === 'any' || b.kind === 'any') {
      return a.kind === b.kind;
    }
    return equality.equals(a.value, b.value);
  },
  hash: (identity) => (identity.kind === 'any' ? '*' : `=${equality.hash(identity.value)}`),
});

/**
 * Wildcard-aware match: true when `pattern` is `ANY` or both values are equal
 */
export const matches = <T>(candidate: T, pattern: Identity<T>, equality: Equality<T>): boolean =>
  pattern.kind === 'any' || equality.equals(candidate, pattern.value);

export const describeIdentity = <T>(identity: Identity<T>): string =>
  identity.kind === 'any' ? 'any' : String(identity.value);
