/**
 * Scope Entry Benchmark
 *
 * Measures the overhead of entering override scopes.
 *
 * Scenarios:
 * 1. Baseline: read without entering a scope
 * 2. Sync scope: copy + one override + read
 * 3. Nested sync scopes (depth 5)
 * 4. Wide store copy: scope entry with 100 cached keys
 * 5. Async scope: withDependenciesAsync around an awaited read
 * 6. Concurrent async scopes: 10 siblings under Promise.all
 */

import { Bench } from 'tinybench';

import { readDependency } from '../src/api/accessor.js';
import { withDependencies, withDependenciesAsync } from '../src/api/with-dependencies.js';
import { Environment } from '../src/core/environment.js';
import { dependencyKey, dependencyValue, type DependencyKey } from '../src/core/key.js';

const ModeKey = dependencyKey<string>('Mode', { production: dependencyValue('live') });

const WideKeys: DependencyKey<number>[] = Array.from({ length: 100 }, (_, i) =>
  dependencyKey(`Wide${i}`, { production: dependencyValue(i) })
);

Environment.use('production');

function nest(depth: number): string {
  if (depth === 0) return readDependency(ModeKey);
  return withDependencies(
    (values) => values.set(ModeKey, `depth-${depth}`),
    () => nest(depth - 1)
  );
}

async function runScopeBench() {
  const bench = new Bench({ time: 1000 });

  bench.add('baseline: root read', () => {
    if (readDependency(ModeKey) !== 'live') throw new Error('Invalid');
  });

  bench.add('sync scope', () => {
    const seen = withDependencies(
      (values) => values.set(ModeKey, 'override'),
      () => readDependency(ModeKey)
    );
    if (seen !== 'override') throw new Error('Invalid');
  });

  bench.add('nested sync scopes (depth 5)', () => {
    if (nest(5) !== 'depth-1') throw new Error('Invalid');
  });

  bench.add('wide copy (100 keys)', () => {
    withDependencies(
      (values) => {
        for (const key of WideKeys) values.resolve(key);
      },
      () => {
        withDependencies(
          (values) => values.set(ModeKey, 'wide'),
          () => {
            if (readDependency(WideKeys[99]) !== 99) throw new Error('Invalid');
          }
        );
      }
    );
  });

  bench.add('async scope', async () => {
    const seen = await withDependenciesAsync(
      (values) => values.set(ModeKey, 'async'),
      async () => {
        await Promise.resolve();
        return readDependency(ModeKey);
      }
    );
    if (seen !== 'async') throw new Error('Invalid');
  });

  bench.add('concurrent async scopes (10)', async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        withDependenciesAsync(
          (values) => values.set(ModeKey, `task-${i}`),
          async () => {
            await Promise.resolve();
            return readDependency(ModeKey);
          }
        )
      )
    );
    results.forEach((seen, i) => {
      if (seen !== `task-${i}`) throw new Error('Invalid');
    });
  });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());
}

runScopeBench().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
