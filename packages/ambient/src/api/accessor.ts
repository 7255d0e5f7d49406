import type { DependencyKey } from '../core/key.js';
import { activeStore } from '../core/scope-stack.js';
import type { DependencyValues } from '../core/store.js';

/**
 * Read-through accessor bound to one key. Holds no value of its own.
 */
export interface DependencyAccessor<V> {
  readonly key: DependencyKey<V>;
  readonly value: V;
}

/**
 * Dependencies active in the current async context.
 */
export function currentDependencies(): DependencyValues {
  return activeStore();
}

/**
 * Current value of `key`: the innermost override, or the environment default.
 */
export function readDependency<V>(key: DependencyKey<V>): V {
  return activeStore().resolve(key);
}

/**
 * Create an accessor that reads `key` from the active scope on every access.
 *
 * @example
 * ```typescript
 * class Mailer {
 *   private readonly transport = dependency(TransportKey);
 *
 *   send(message: Message) {
 *     return this.transport.value.deliver(message);
 *   }
 * }
 * ```
 */
export function dependency<V>(key: DependencyKey<V>): DependencyAccessor<V> {
  return Object.freeze({
    key,
    get value(): V {
      return readDependency(key);
    },
  });
}
