import { readDependency } from '../api/accessor.js';
import { isDependencyKey, type DependencyKey } from '../core/key.js';
import { InvalidDependencyKeyError } from '../errors/errors.js';

/**
 * Property decorator exposing a dependency as a read-only field.
 *
 * Installs a getter on the class prototype that reads the key from the active
 * scope on every access, so an instance created outside a scope still sees
 * the overrides of whatever scope later calls into it. The field holds no
 * state of its own; assigning to it throws.
 *
 * Requires `experimentalDecorators`. Declare the field without an initializer
 * and with `useDefineForClassFields: false`, otherwise the class field would
 * shadow the getter.
 *
 * @param key - Dependency key to read
 *
 * @example
 * ```typescript
 * class ReportService {
 *   @Dependency(LoggerKey)
 *   private readonly logger!: Logger;
 *
 *   run() {
 *     this.logger.info('running');
 *   }
 * }
 * ```
 */
export function Dependency<V>(key: DependencyKey<V>): PropertyDecorator {
  if (!isDependencyKey(key)) {
    throw new InvalidDependencyKeyError(key, '@Dependency expects a key created with dependencyKey()');
  }

  return function (target: object, propertyKey: string | symbol) {
    Object.defineProperty(target, propertyKey, {
      configurable: true,
      enumerable: false,
      get(): V {
        return readDependency(key);
      },
      set(): never {
        throw new TypeError(`Cannot assign to dependency property '${String(propertyKey)}'.`);
      },
    });
  };
}
