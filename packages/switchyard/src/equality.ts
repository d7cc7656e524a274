/**
 * Equality and hashing for host-supplied state and event values
 *
 * The engine never compares states or events directly. Every table lookup goes
 * through an Equality, so hosts can plug in structural comparison for object
 * states while primitives work out of the box.
 */

/**
 * Equality capability required from state and event types.
 * `hash` must agree with `equals`: equal values produce equal hashes.
 */
export interface Equality<T> {
  equals(a: T, b: T): boolean;
  hash(value: T): string;
}

/**
 * Per-object sequence numbers for reference hashing.
 * WeakMap so hashed objects can still be collected.
 */
const objectIds = new WeakMap<object, number>();
const symbolIds = new Map<symbol, number>();
let nextObjectId = 0;

const referenceHash = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'object':
    case 'function': {
      let id = objectIds.get(value);
      if (id === undefined) {
        id = ++nextObjectId;
        objectIds.set(value, id);
      }
      return `ref:${id}`;
    }
    case 'symbol': {
      let id = symbolIds.get(value);
      if (id === undefined) {
        id = ++nextObjectId;
        symbolIds.set(value, id);
      }
      return `symbol:${id}`;
    }
    default:
      return `${typeof value}:${String(value)}`;
  }
};

/**
 * Default equality: `Object.is` for comparison, reference identity for objects.
 *
 * @example
 * ```ts
 * defaultEquality.equals('idle', 'idle'); // true
 * defaultEquality.equals({ id: 1 }, { id: 1 }); // false (different references)
 * ```
 */
export const defaultEquality: Equality<unknown> = {
  equals: (a, b) => Object.is(a, b),
  hash: referenceHash,
};

/**
 * Serialize a JSON-shaped value with sorted object keys
 */
const stableStringify = (value: unknown): string => {
  if (value === undefined) {
    return 'undefined';
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }

  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`).join(',')}}`;
};

/**
 * Structural equality for plain JSON-shaped values (objects, arrays, primitives).
 * Key order does not matter.
 *
 * @example
 * ```ts
 * const machine = new StateMachine({ screen: 'home' }, undefined, {
 *   stateEquality: jsonEquality,
 * });
 * machine.addRoute(transition({ screen: 'home' }, { screen: 'settings' }));
 * machine.tryState({ screen: 'settings' }); // true
 * ```
 */
export const jsonEquality: Equality<unknown> = {
  equals: (a, b) => stableStringify(a) === stableStringify(b),
  hash: stableStringify,
};
