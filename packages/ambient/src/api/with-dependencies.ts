import { capture, enter } from '../core/scope-stack.js';
import type { DependencyValues } from '../core/store.js';

/**
 * Edits the scope's copy of the current dependencies before the operation runs.
 */
export type DependencyMutator = (values: DependencyValues) => void;

/**
 * Run a synchronous operation with some dependencies overridden.
 *
 * The mutator receives a copy of the dependencies active at the call site;
 * the operation and everything it calls see that copy. When the operation
 * returns or throws, the previous dependencies are active again and any error
 * is rethrown unchanged.
 *
 * @example
 * ```typescript
 * const report = withDependencies(
 *   (values) => values.set(ClockKey, fixedClock),
 *   () => buildReport()
 * );
 * ```
 */
export function withDependencies<R>(mutate: DependencyMutator, operation: () => R): R {
  return enter(mutate, operation);
}

/**
 * Run an operation that may suspend with some dependencies overridden.
 *
 * The override stays attached to this operation across every `await`, and to
 * the promises, timers and callbacks it starts, without becoming visible to
 * other operations interleaving on the event loop. The returned promise
 * settles after the operation's scope has been left; a rejection carries the
 * operation's original error.
 *
 * @example
 * ```typescript
 * await withDependenciesAsync(
 *   (values) => {
 *     values.set(LoggerKey, new MemoryLogger());
 *     values.set(DatabaseKey, new InMemoryDatabase());
 *   },
 *   async () => {
 *     await service.sync();
 *   }
 * );
 * ```
 */
export async function withDependenciesAsync<R>(
  mutate: DependencyMutator,
  operation: () => Promise<R> | R
): Promise<R> {
  return await enter(mutate, async () => await operation());
}

/**
 * Bind `fn` to the dependencies active right now.
 *
 * Useful for callbacks registered inside a scope but invoked later from code
 * that runs outside it, such as event emitter listeners.
 *
 * @example
 * ```typescript
 * withDependencies(
 *   (values) => values.set(LoggerKey, requestLogger),
 *   () => emitter.on('done', bindDependencies(onDone))
 * );
 * ```
 */
export function bindDependencies<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
  return capture(fn);
}
