import { InvalidDependencyKeyError } from '../errors/errors.js';

/**
 * Branded type for dependency key identifiers.
 * Prevents accidental use of raw strings as store slots.
 */
export type KeyId = string & { __brand: 'KeyId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates keys with their value type without runtime overhead.
 */
declare const KEY_BRAND: unique symbol;

/** Produces the default value of a key for one classification. */
export type DefaultFactory<V> = () => V;

/** Runtime predicate that proves an erased value has the key's type. */
export type ValueGuard<V> = (value: unknown) => value is V;

/**
 * Type-safe dependency key.
 *
 * Keys uniquely identify a dependency and carry its value type at compile
 * time via the phantom type parameter V. Identity is the object itself: two
 * keys created with the same label are still distinct.
 *
 * @template V - The type of value this key resolves to
 */
export interface DependencyKey<V = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'dependency-key';

  /** Diagnostic identifier (dep_1, dep_2, etc.) */
  readonly id: KeyId;

  /** Human-readable label for debugging and error messages */
  readonly label: string;

  /**
   * Store slot for this key. Unlike `id`, which counts within one loaded copy
   * of this module, the symbol is unique across copies.
   */
  readonly sym: symbol;

  /** Default used in production. */
  readonly production: DefaultFactory<V>;

  /** Default used under a test harness. Falls back to `production`. */
  readonly test: DefaultFactory<V>;

  /** Default used in interactive preview. Falls back to `production`. */
  readonly preview: DefaultFactory<V>;

  /** Optional runtime check applied on `set` and on read. */
  readonly guard?: ValueGuard<V>;

  /** Phantom type brand - associates key with its value type */
  readonly [KEY_BRAND]: V;
}

export interface DependencyKeyOptions<V> {
  production: DefaultFactory<V>;
  test?: DefaultFactory<V>;
  preview?: DefaultFactory<V>;
  guard?: ValueGuard<V>;
}

/**
 * Global counter for generating unique key IDs.
 */
let _keyCounter = 0;

/**
 * Define a new dependency.
 *
 * Defaults are factories so that a value may be built lazily; the store that
 * first resolves the key caches the result for its own lifetime.
 *
 * @template V - The type of value the key resolves to
 * @param label - Human-readable label used in diagnostics
 * @returns A frozen key with a unique identity
 *
 * @example
 * ```typescript
 * const LoggerKey = dependencyKey<Logger>('Logger', {
 *   production: () => new ConsoleLogger(),
 *   test: () => new MemoryLogger(),
 * });
 * ```
 */
export function dependencyKey<V>(label: string, options: DependencyKeyOptions<V>): DependencyKey<V> {
  if (!options || typeof options.production !== 'function') {
    throw new InvalidDependencyKeyError(options, `'${label}' needs a 'production' factory`);
  }
  for (const field of ['test', 'preview', 'guard'] as const) {
    const value = options[field];
    if (value !== undefined && typeof value !== 'function') {
      throw new InvalidDependencyKeyError(options, `'${label}.${field}' must be a function`);
    }
  }

  const { production, guard } = options;
  const id = `dep_${++_keyCounter}` as KeyId;
  const key = {
    kind: 'dependency-key' as const,
    id,
    label,
    sym: Symbol(label),
    production,
    test: options.test ?? production,
    preview: options.preview ?? production,
    guard,
  };
  return Object.freeze(key) as DependencyKey<V>;
}

/**
 * Build a default factory that always returns the same value.
 *
 * @example
 * ```typescript
 * const RetriesKey = dependencyKey('Retries', { production: dependencyValue(3) });
 * ```
 */
export function dependencyValue<V>(value: V): DefaultFactory<V> {
  return () => value;
}

/**
 * Runtime type guard to check if a value is a dependency key.
 */
export function isDependencyKey(x: unknown): x is DependencyKey<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as DependencyKey).kind === 'dependency-key' &&
    typeof (x as DependencyKey).id === 'string' &&
    typeof (x as DependencyKey).label === 'string' &&
    typeof (x as DependencyKey).sym === 'symbol' &&
    typeof (x as DependencyKey).production === 'function'
  );
}
