/**
 * Resolution Benchmark
 *
 * Measures the cost of reading dependencies through the active scope.
 *
 * Scenarios:
 * 1. Store hit: resolve a cached key on a private store
 * 2. Root read: readDependency() with no scope entered
 * 3. Scoped read: readDependency() inside one override scope
 * 4. Accessor: dependency(key).value
 * 5. Cold default: reset + resolve (default factory on every read)
 */

import { Bench } from 'tinybench';

import { dependency, readDependency } from '../src/api/accessor.js';
import { withDependencies } from '../src/api/with-dependencies.js';
import { Environment } from '../src/core/environment.js';
import { dependencyKey } from '../src/core/key.js';
import { DependencyStore } from '../src/core/store.js';

interface Clock {
  now(): number;
}

const ClockKey = dependencyKey<Clock>('Clock', {
  production: () => ({ now: () => Date.now() }),
  test: () => ({ now: () => 0 }),
});

Environment.use('production');

async function runResolutionBench() {
  const bench = new Bench({ time: 1000 });
  const store = new DependencyStore();
  const accessor = dependency(ClockKey);
  store.resolve(ClockKey);

  bench.add('store hit', () => {
    if (typeof store.resolve(ClockKey).now !== 'function') throw new Error('Invalid');
  });

  bench.add('root read', () => {
    if (typeof readDependency(ClockKey).now !== 'function') throw new Error('Invalid');
  });

  bench.add('scoped read (1000 reads)', () => {
    withDependencies(
      (values) => values.set(ClockKey, { now: () => 42 }),
      () => {
        for (let i = 0; i < 1000; i++) {
          if (readDependency(ClockKey).now() !== 42) throw new Error('Invalid');
        }
      }
    );
  });

  bench.add('accessor read', () => {
    if (typeof accessor.value.now !== 'function') throw new Error('Invalid');
  });

  bench.add('cold default', () => {
    store.reset(ClockKey);
    if (typeof store.resolve(ClockKey).now !== 'function') throw new Error('Invalid');
  });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());
}

runResolutionBench().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
