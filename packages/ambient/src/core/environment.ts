/*
 * Environment classification
 * --------------------------
 * Decides which of a key's three defaults seeds a store.
 *
 * Precedence is preview > test > production. The default probe reads explicit
 * process signals only:
 *   AMBIENT_ENV=production|test|preview   explicit classification, wins outright
 *   AMBIENT_PREVIEW=1                     interactive preview / sandbox
 *   NODE_ENV=test, VITEST, JEST_WORKER_ID,
 *   NODE_TEST_CONTEXT                     automated test harness
 *   NODE_ENV=development                  development runs use test defaults
 *
 * The classification is cached process-wide after the first probe. Hosts that
 * know better install their own probe with Environment.use().
 */
import { InvalidEnvironmentError } from '../errors/errors.js';
import type { DependencyKey } from './key.js';

export type Classification = 'production' | 'test' | 'preview';

/** Returns the classification of the running process. */
export type EnvironmentProbe = () => Classification;

const CLASSIFICATIONS: readonly Classification[] = ['production', 'test', 'preview'];
const KNOWN: ReadonlySet<string> = new Set(CLASSIFICATIONS);

export function isClassification(value: unknown): value is Classification {
  return typeof value === 'string' && KNOWN.has(value);
}

const TEST_HARNESS_VARIABLES = ['VITEST', 'JEST_WORKER_ID', 'NODE_TEST_CONTEXT'] as const;

/**
 * Classify a set of environment variables.
 *
 * Exposed separately from {@link Environment} so hosts can classify a
 * variable set other than `process.env`.
 */
export function classifyEnv(env: NodeJS.ProcessEnv): Classification {
  const explicit = env.AMBIENT_ENV;
  if (explicit) {
    if (isClassification(explicit)) return explicit;
    console.warn(
      `[Ambient] Ignoring AMBIENT_ENV='${explicit}': expected one of ${CLASSIFICATIONS.join(', ')}.`
    );
  }

  if (env.AMBIENT_PREVIEW === '1') return 'preview';

  if (env.NODE_ENV === 'test') return 'test';
  for (const name of TEST_HARNESS_VARIABLES) {
    if (env[name] !== undefined) return 'test';
  }

  if (env.NODE_ENV === 'development') return 'test';

  return 'production';
}

const defaultProbe: EnvironmentProbe = () => classifyEnv(process.env);

/**
 * Process-wide environment classification.
 *
 * @remarks
 * - `current()` probes once and caches the answer
 * - `use()` swaps the probe (or pins a classification) and clears the cache
 * - `reset()` restores the default probe; intended for tests
 */
export class Environment {
  private static probe: EnvironmentProbe = defaultProbe;
  private static cached: Classification | undefined;

  /**
   * Current classification of the process.
   *
   * @throws {InvalidEnvironmentError} if an installed probe returns something
   * other than a classification
   */
  static current(): Classification {
    if (this.cached === undefined) {
      const result: unknown = this.probe();
      if (!isClassification(result)) throw new InvalidEnvironmentError(result);
      this.cached = result;
    }
    return this.cached;
  }

  /**
   * Install a probe, or pin a fixed classification.
   *
   * @example
   * ```typescript
   * Environment.use('preview');
   * Environment.use(() => (isStorybook() ? 'preview' : 'production'));
   * ```
   */
  static use(source: Classification | EnvironmentProbe): void {
    if (typeof source === 'function') {
      this.probe = source;
    } else if (isClassification(source)) {
      this.probe = () => source;
    } else {
      throw new InvalidEnvironmentError(source);
    }
    this.cached = undefined;
  }

  /**
   * Restore the default probe and forget the cached classification.
   *
   * @internal
   */
  static reset(): void {
    this.probe = defaultProbe;
    this.cached = undefined;
  }
}

/**
 * Pick and build the default of `key` for a classification.
 *
 * Pure apart from whatever the key's own factory does.
 */
export function defaultFor<V>(key: DependencyKey<V>, classification: Classification): V {
  switch (classification) {
    case 'preview':
      return key.preview();
    case 'test':
      return key.test();
    case 'production':
      return key.production();
  }
}
