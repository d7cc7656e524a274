/**
 * Revocation handles
 *
 * Handles reach their owner through a WeakRef only: an outstanding handle
 * never keeps a machine alive, and a handle that outlives its machine
 * revokes nothing.
 */

import type { Disposable } from './types.js';

/**
 * Wrap a cleanup so it runs at most once
 */
export const createDisposable = (cleanup: () => void): Disposable => {
  let disposed = false;
  return () => {
    if (disposed) {
      return;
    }
    disposed = true;
    cleanup();
  };
};

/**
 * Handle that calls `remove` on the owner while the owner is still alive
 */
export const weakDisposable = <T extends object>(
  owner: T,
  remove: (owner: T) => void
): Disposable => {
  const ref = new WeakRef(owner);
  return createDisposable(() => {
    const target = ref.deref();
    if (target) {
      remove(target);
    }
  });
};

/**
 * One handle revoking several registrations
 */
export const composeDisposables = (...disposables: Disposable[]): Disposable =>
  createDisposable(() => {
    for (const dispose of disposables) {
      dispose();
    }
  });
