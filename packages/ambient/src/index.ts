export {
  bindDependencies,
  withDependencies,
  withDependenciesAsync,
  type DependencyMutator,
} from './api/with-dependencies.js';
export {
  currentDependencies,
  dependency,
  readDependency,
  type DependencyAccessor,
} from './api/accessor.js';

export { Dependency } from './decorators/dependency.js';

export * from './core/key.js';

export {
  classifyEnv,
  defaultFor,
  Environment,
  isClassification,
  type Classification,
  type EnvironmentProbe,
} from './core/environment.js';
export {
  DependencyStore,
  type BoundValue,
  type DependencyStoreOptions,
  type DependencyValues,
} from './core/store.js';
export { resetRootDependencies, scopeDepth } from './core/scope-stack.js';

export {
  DependencyTypeMismatchError,
  InvalidDependencyKeyError,
  InvalidEnvironmentError,
} from './errors/errors.js';
