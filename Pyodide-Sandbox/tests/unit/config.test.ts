import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { getConfig, resetConfig, expandHome } from '../../src/config.js';
import { ConfigurationError } from '@pysandbox/shared/Types/errors.js';

const KEYS = [
  'SANDBOX_DEFAULT_TIMEOUT_S',
  'SANDBOX_MAX_TIMEOUT_S',
  'SANDBOX_INTERRUPT_GRACE_MS',
  'SANDBOX_PACKAGES',
  'SANDBOX_PYODIDE_INDEX_URL',
  'SANDBOX_LOG_DIR',
  'SANDBOX_MAX_LOG_CHARS',
];

let saved: Record<string, string | undefined>;

beforeEach(() => {
  saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]));
  for (const key of KEYS) delete process.env[key];
  resetConfig();
});

afterEach(() => {
  for (const key of KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  resetConfig();
});

describe('getConfig', () => {
  it('applies defaults', () => {
    expect(getConfig()).toEqual({
      defaultTimeoutSeconds: 30,
      maxTimeoutSeconds: 300,
      interruptGraceMs: 2000,
      packages: ['numpy', 'pandas', 'matplotlib'],
      maxLogChars: 10000,
    });
  });

  it('reads and coerces environment values', () => {
    process.env.SANDBOX_DEFAULT_TIMEOUT_S = '5';
    process.env.SANDBOX_MAX_TIMEOUT_S = '60';
    process.env.SANDBOX_INTERRUPT_GRACE_MS = '250';
    process.env.SANDBOX_PACKAGES = ' numpy , ,scipy ';
    process.env.SANDBOX_PYODIDE_INDEX_URL = '/opt/pyodide/';
    process.env.SANDBOX_MAX_LOG_CHARS = '500';

    expect(getConfig()).toEqual({
      defaultTimeoutSeconds: 5,
      maxTimeoutSeconds: 60,
      interruptGraceMs: 250,
      packages: ['numpy', 'scipy'],
      pyodideIndexUrl: '/opt/pyodide/',
      maxLogChars: 500,
    });
  });

  it('allows an empty package set', () => {
    process.env.SANDBOX_PACKAGES = '';

    expect(getConfig().packages).toEqual([]);
  });

  it('expands ~ in the log directory', () => {
    process.env.SANDBOX_LOG_DIR = '~/sandbox-logs';

    expect(getConfig().logDir).toBe(join(homedir(), 'sandbox-logs'));
  });

  it('caches until reset', () => {
    const first = getConfig();
    process.env.SANDBOX_DEFAULT_TIMEOUT_S = '7';

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().defaultTimeoutSeconds).toBe(7);
  });

  it('rejects invalid values with a ConfigurationError', () => {
    process.env.SANDBOX_DEFAULT_TIMEOUT_S = '-1';

    expect(() => getConfig()).toThrow(ConfigurationError);
    expect(() => getConfig()).toThrow(/^Sandbox config error: defaultTimeoutSeconds: /);
  });

  it('rejects a default above the maximum', () => {
    process.env.SANDBOX_DEFAULT_TIMEOUT_S = '600';

    expect(() => getConfig()).toThrow(
      'Sandbox config error: defaultTimeoutSeconds: default timeout must not exceed the maximum timeout',
    );
  });
});

describe('expandHome', () => {
  it('only expands a leading ~', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('/var/~log')).toBe('/var/~log');
  });
});
