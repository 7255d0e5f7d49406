/*
 * ScopeStack
 * ----------
 * Associates a DependencyStore with the current async execution context.
 *
 * Propagation follows AsyncLocalStorage:
 *  - run(store, fn) makes `store` active for fn and for every promise, timer
 *    and callback created while fn runs, then restores the previous store
 *    when fn returns or throws
 *  - async children capture the store active when they were created; a child
 *    that enters its own scope does not affect its siblings or its parent
 *  - contexts interleaving on the event loop each see their own store across
 *    awaits
 *
 * With no scope entered the root store is active. It lives for the whole
 * process so defaults cached at the root are shared by all code outside any
 * scope.
 */
import { AsyncLocalStorage } from 'node:async_hooks';

import { DependencyStore, type DependencyValues } from './store.js';

const storage = new AsyncLocalStorage<DependencyStore>();

let root = new DependencyStore();

/** Store each scope was copied from, for scopeDepth(). */
const parents = new WeakMap<DependencyStore, DependencyStore>();

/**
 * Store active in the current async context, or the root store.
 */
export function activeStore(): DependencyStore {
  return storage.getStore() ?? root;
}

/**
 * Nesting depth of the current context; 0 at the root.
 */
export function scopeDepth(): number {
  let depth = 0;
  for (let store = storage.getStore(); store && store !== root; store = parents.get(store)) {
    depth++;
  }
  return depth;
}

/**
 * Copy the active store, let `mutate` edit the copy, then run `work` with the
 * copy active. The previous store is active again once `work` returns or
 * throws. When `work` returns a promise, the copy stays attached to that
 * promise's continuations only.
 */
export function enter<R>(mutate: (values: DependencyValues) => void, work: () => R): R {
  const current = storage.getStore();
  const next = (current ?? root).copy();
  if (current) parents.set(next, current);
  mutate(next);
  return storage.run(next, work);
}

/**
 * Wrap `fn` so it always runs under the store active right now, wherever it
 * is eventually invoked from.
 */
export function capture<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
  const captured = activeStore();
  return (...args: A): R => storage.run(captured, fn, ...args);
}

/**
 * Replace the root store with an empty one.
 *
 * Scopes already running keep the copies they were entered with.
 *
 * @internal Primarily useful for test isolation
 */
export function resetRootDependencies(): void {
  root = new DependencyStore();
}
