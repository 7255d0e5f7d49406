const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const render = (value: unknown): string => {
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

/**
 * A store entry read under a key does not belong to that key.
 *
 * Raised when the bound value was stored under a copy of the key object
 * rather than the key itself, or when it fails the key's guard. Either way the store has
 * been corrupted by a key-identity bug; the value is never handed out.
 */
export class DependencyTypeMismatchError extends Error {
  constructor(
    public label: string,
    public keyId: string,
    public kind: 'foreign-key' | 'guard'
  ) {
    const reason =
      kind === 'guard'
        ? `The value bound to '${label}' [${keyId}] failed the key's guard.`
        : `The slot for '${label}' [${keyId}] holds a value bound under a different key object.`;
    const dev = [
      'Dependency type mismatch',
      '',
      reason,
      '',
      'Common causes:',
      `  1. A key object was copied or rebuilt instead of via dependencyKey()`,
      `  2. An untyped caller set a value of the wrong type`,
    ];
    super(format(`Dependency type mismatch for '${label}' [${keyId}].`, dev));
    this.name = 'DependencyTypeMismatchError';
  }
}

export class InvalidDependencyKeyError extends Error {
  constructor(
    public received: unknown,
    public reason?: string
  ) {
    const dev = [
      'Invalid dependency key',
      '',
      reason ? `${reason}.` : `Expected a key created with dependencyKey().`,
      '',
      'Received:',
      `  ${render(received)}`,
      '',
      'Valid key usage:',
      `  const LoggerKey = dependencyKey<Logger>('Logger', {`,
      `    production: () => new ConsoleLogger(),`,
      `    test: () => new MemoryLogger(),`,
      `  });`,
    ];
    super(format(reason ? `Invalid dependency key: ${reason}.` : 'Invalid dependency key.', dev));
    this.name = 'InvalidDependencyKeyError';
  }
}

export class InvalidEnvironmentError extends Error {
  constructor(public received: unknown) {
    const dev = [
      'Invalid environment',
      '',
      `Environment.use() expects 'production', 'test', 'preview' or a probe function.`,
      '',
      'Received:',
      `  ${render(received)}`,
    ];
    super(format('Invalid environment.', dev));
    this.name = 'InvalidEnvironmentError';
  }
}
