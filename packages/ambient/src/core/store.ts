/*
 * DependencyStore
 * ---------------
 * Type-erased map from key slot to the value currently bound for that key.
 *
 * Responsibilities
 *  - cache the first resolved default of every key read through it
 *  - hold overrides written by set()
 *  - hand out independent copies for nested scopes
 *
 * Design notes
 *  - Slots are keyed by the key's symbol, not its id: ids restart in every
 *    loaded copy of key.ts, symbols never collide.
 *  - Each slot keeps the key object it was bound under. Reads compare that
 *    object with the key being asked for; a copied key object sharing the
 *    symbol is a key-identity bug and fails with DependencyTypeMismatchError.
 *  - Every operation is synchronous, so no other async context can observe a
 *    store half-way through a mutation, and copy() is always a consistent
 *    snapshot.
 *  - copy() is shallow: bound values are shared, slots are not.
 */
import { DependencyTypeMismatchError, InvalidDependencyKeyError } from '../errors/errors.js';
import { defaultFor, Environment, type EnvironmentProbe } from './environment.js';
import { isDependencyKey, type DependencyKey } from './key.js';

/**
 * Development mode flag for conditional validation.
 * In production builds, key validation is skipped.
 */
const IS_DEV = process.env.NODE_ENV !== 'production';

function assertValidKey(key: unknown): asserts key is DependencyKey {
  if (!IS_DEV) return;
  if (!isDependencyKey(key)) throw new InvalidDependencyKeyError(key);
}

/**
 * An erased value stored alongside the key it was bound under.
 */
export interface BoundValue {
  readonly key: DependencyKey<unknown>;
  readonly value: unknown;
}

/**
 * Read/write view of the dependencies bound in one scope.
 *
 * This is what override mutators receive and what accessors read through.
 */
export interface DependencyValues {
  /** Cached value for `key`, without computing a default. */
  get<V>(key: DependencyKey<V>): V | undefined;
  /** Cached value for `key`, or its environment default (cached on first read). */
  resolve<V>(key: DependencyKey<V>): V;
  /** Bind `value` to `key` in this scope. */
  set<V>(key: DependencyKey<V>, value: V): void;
  /** Whether `key` currently has a cached or overridden value. */
  has(key: DependencyKey<unknown>): boolean;
  /** Drop the cached value so the next `resolve` recomputes the default. */
  reset(key: DependencyKey<unknown>): boolean;
}

export interface DependencyStoreOptions {
  /**
   * Classification source for defaults computed by this store.
   * Defaults to the process-wide {@link Environment}.
   */
  classify?: EnvironmentProbe;
}

const processClassification: EnvironmentProbe = () => Environment.current();

export class DependencyStore implements DependencyValues {
  /** Slots keyed by key symbol. */
  private readonly slots: Map<symbol, BoundValue>;

  private readonly classify: EnvironmentProbe;

  constructor(options?: DependencyStoreOptions, slots?: ReadonlyMap<symbol, BoundValue>) {
    this.classify = options?.classify ?? processClassification;
    this.slots = new Map(slots);
  }

  /**
   * Number of keys with a cached or overridden value.
   */
  get size(): number {
    return this.slots.size;
  }

  /**
   * Labels of the bound keys, for diagnostics.
   */
  *keys(): IterableIterator<string> {
    for (const bound of this.slots.values()) yield `${bound.key.label} [${bound.key.id}]`;
  }

  get<V>(key: DependencyKey<V>): V | undefined {
    assertValidKey(key);
    const bound = this.slots.get(key.sym);
    return bound === undefined ? undefined : this.unwrap(key, bound);
  }

  /**
   * Return the bound value for `key`, seeding it with the environment default
   * on first access. Later reads in this store return the same value until it
   * is overwritten or reset.
   */
  resolve<V>(key: DependencyKey<V>): V {
    assertValidKey(key);
    const bound = this.slots.get(key.sym);
    if (bound !== undefined) return this.unwrap(key, bound);

    const value = defaultFor(key, this.classify());
    this.bind(key, value);
    return value;
  }

  /**
   * @throws {DependencyTypeMismatchError} if the key has a guard and `value`
   * fails it
   */
  set<V>(key: DependencyKey<V>, value: V): void {
    assertValidKey(key);
    this.bind(key, value);
  }

  has(key: DependencyKey<unknown>): boolean {
    assertValidKey(key);
    return this.slots.has(key.sym);
  }

  reset(key: DependencyKey<unknown>): boolean {
    assertValidKey(key);
    return this.slots.delete(key.sym);
  }

  /**
   * Produce an independent store with the same bindings.
   *
   * The copy consults the same classification source as this store.
   */
  copy(): DependencyStore {
    return new DependencyStore({ classify: this.classify }, this.slots);
  }

  private bind<V>(key: DependencyKey<V>, value: V): void {
    if (key.guard && !key.guard(value)) {
      throw new DependencyTypeMismatchError(key.label, key.id, 'guard');
    }
    this.slots.set(key.sym, { key, value });
  }

  private unwrap<V>(key: DependencyKey<V>, bound: BoundValue): V {
    if (bound.key !== key) {
      throw new DependencyTypeMismatchError(key.label, key.id, 'foreign-key');
    }
    if (key.guard && !key.guard(bound.value)) {
      throw new DependencyTypeMismatchError(key.label, key.id, 'guard');
    }
    // The slot was written by bind() under this exact key object, so the
    // erased value is a V.
    return bound.value as V;
  }
}
