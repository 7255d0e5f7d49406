import { afterEach, describe, expect, it, vi } from 'vitest';

import type { Classification } from '../src/core/environment.js';
import { dependencyKey, dependencyValue, type DependencyKey } from '../src/core/key.js';
import { DependencyStore } from '../src/core/store.js';
import { DependencyTypeMismatchError, InvalidDependencyKeyError } from '../src/errors/errors.js';

const storeFor = (classification: Classification) =>
  new DependencyStore({ classify: () => classification });

const ModeKey = dependencyKey<string>('Mode', {
  production: dependencyValue('production'),
  test: dependencyValue('test'),
  preview: dependencyValue('preview'),
});

function counterKey(): DependencyKey<{ n: number }> {
  let n = 0;
  return dependencyKey('Counter', { production: () => ({ n: ++n }) });
}

describe('DependencyStore', () => {
  it('computes the default for the store classification', () => {
    expect(storeFor('production').resolve(ModeKey)).toBe('production');
    expect(storeFor('test').resolve(ModeKey)).toBe('test');
    expect(storeFor('preview').resolve(ModeKey)).toBe('preview');
  });

  it('resolves production-only keys to the same value everywhere', () => {
    const shared = { name: 'shared' };
    const SharedKey = dependencyKey('Shared', { production: dependencyValue(shared) });

    expect(storeFor('production').resolve(SharedKey)).toBe(shared);
    expect(storeFor('test').resolve(SharedKey)).toBe(shared);
    expect(storeFor('preview').resolve(SharedKey)).toBe(shared);
  });

  it('caches the first resolved default', () => {
    const CounterKey = counterKey();
    const store = storeFor('production');

    const first = store.resolve(CounterKey);
    const second = store.resolve(CounterKey);

    expect(first).toBe(second);
    expect(first.n).toBe(1);
  });

  it('get() reads without computing a default', () => {
    const store = storeFor('test');

    expect(store.get(ModeKey)).toBeUndefined();
    expect(store.has(ModeKey)).toBe(false);
    expect(store.size).toBe(0);

    store.resolve(ModeKey);

    expect(store.get(ModeKey)).toBe('test');
    expect(store.has(ModeKey)).toBe(true);
  });

  it('set() overrides both missing and cached values', () => {
    const store = storeFor('test');

    store.set(ModeKey, 'override');
    expect(store.resolve(ModeKey)).toBe('override');

    store.set(ModeKey, 'again');
    expect(store.get(ModeKey)).toBe('again');
    expect(store.size).toBe(1);
  });

  it('reset() drops the cached value so the default is recomputed', () => {
    const CounterKey = counterKey();
    const store = storeFor('production');

    expect(store.reset(CounterKey)).toBe(false);

    const first = store.resolve(CounterKey);
    expect(store.reset(CounterKey)).toBe(true);
    const second = store.resolve(CounterKey);

    expect(second).not.toBe(first);
    expect(second.n).toBe(2);
  });

  it('copy() produces an independent mapping sharing the values', () => {
    const payload = { id: 1 };
    const PayloadKey = dependencyKey('Payload', { production: dependencyValue({ id: 0 }) });
    const parent = storeFor('test');
    parent.set(ModeKey, 'parent');
    parent.set(PayloadKey, payload);

    const child = parent.copy();
    child.set(ModeKey, 'child');

    expect(parent.get(ModeKey)).toBe('parent');
    expect(child.get(ModeKey)).toBe('child');
    expect(child.get(PayloadKey)).toBe(payload);

    parent.reset(PayloadKey);
    expect(child.get(PayloadKey)).toBe(payload);
  });

  it('copy() keeps the classification source', () => {
    const child = storeFor('preview').copy();

    expect(child.resolve(ModeKey)).toBe('preview');
  });

  it('lists bound keys for diagnostics', () => {
    const store = storeFor('test');
    store.resolve(ModeKey);

    expect(Array.from(store.keys())).toEqual([`Mode [${ModeKey.id}]`]);
  });

  it('fails loudly when a slot holds a value bound under another key object', () => {
    const store = storeFor('test');
    store.set(ModeKey, 'bound');
    const impostor: DependencyKey<string> = { ...ModeKey, production: dependencyValue('x') };

    expect(() => store.get(impostor)).toThrow(DependencyTypeMismatchError);
    expect(() => store.resolve(impostor)).toThrow(
      `The slot for 'Mode' [${ModeKey.id}] holds a value bound under a different key object.`
    );
  });

  describe('keys from separately loaded copies of the key module', () => {
    afterEach(() => {
      vi.resetModules();
    });

    it('keeps keys that share an id in separate slots', async () => {
      vi.resetModules();
      const first = await import('../src/core/key.js');
      vi.resetModules();
      const second = await import('../src/core/key.js');

      const UserKey = first.dependencyKey('User', { production: first.dependencyValue('anonymous') });
      const PortKey = second.dependencyKey('Port', { production: second.dependencyValue(80) });
      expect(UserKey.id).toBe(PortKey.id);

      const store = storeFor('production');
      store.set(UserKey, 'bob');
      store.set(PortKey, 8080);

      expect(store.size).toBe(2);
      expect(store.resolve(UserKey)).toBe('bob');
      expect(store.resolve(PortKey)).toBe(8080);
      expect(store.copy().resolve(UserKey)).toBe('bob');
    });
  });

  it('checks values against the key guard', () => {
    const PortKey = dependencyKey<number>('Port', {
      production: dependencyValue(8080),
      guard: (value): value is number => typeof value === 'number',
    });
    const store = storeFor('production');

    expect(store.resolve(PortKey)).toBe(8080);
    expect(() => store.set(PortKey, '8080' as never)).toThrow(DependencyTypeMismatchError);
    expect(store.get(PortKey)).toBe(8080);
  });

  it('rejects a guard-failing default', () => {
    const PortKey = dependencyKey<number>('Port', {
      production: () => Number.NaN,
      guard: (value): value is number => typeof value === 'number' && !Number.isNaN(value),
    });

    let caught: unknown;
    try {
      storeFor('production').resolve(PortKey);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DependencyTypeMismatchError);
    expect((caught as DependencyTypeMismatchError).kind).toBe('guard');
    expect((caught as DependencyTypeMismatchError).keyId).toBe(PortKey.id);
  });

  it('rejects non-keys in development', () => {
    const store = storeFor('test');

    expect(() => store.resolve({} as never)).toThrow(InvalidDependencyKeyError);
    expect(() => store.set(null as never, 'x')).toThrow(InvalidDependencyKeyError);
  });
});
