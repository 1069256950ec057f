/**
 * Pyodide Sandbox configuration
 *
 * Zod-validated environment config for the worker process.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@pysandbox/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const packageList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  );

const configSchema = z
  .object({
    defaultTimeoutSeconds: z.coerce.number().positive().default(30),
    maxTimeoutSeconds: z.coerce.number().positive().default(300),
    interruptGraceMs: z.coerce.number().int().nonnegative().default(2_000),
    packages: packageList.default('numpy,pandas,matplotlib'),
    pyodideIndexUrl: z.string().min(1).optional(),
    logDir: z.string().min(1).optional(),
    maxLogChars: z.coerce.number().int().positive().default(10_000),
  })
  .refine((c) => c.defaultTimeoutSeconds <= c.maxTimeoutSeconds, {
    message: 'default timeout must not exceed the maximum timeout',
    path: ['defaultTimeoutSeconds'],
  });

export type SandboxConfig = z.infer<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: SandboxConfig | null = null;

export function getConfig(): SandboxConfig {
  if (cached) return cached;

  const raw = {
    defaultTimeoutSeconds: process.env.SANDBOX_DEFAULT_TIMEOUT_S,
    maxTimeoutSeconds: process.env.SANDBOX_MAX_TIMEOUT_S,
    interruptGraceMs: process.env.SANDBOX_INTERRUPT_GRACE_MS,
    packages: process.env.SANDBOX_PACKAGES,
    pyodideIndexUrl: process.env.SANDBOX_PYODIDE_INDEX_URL,
    logDir: process.env.SANDBOX_LOG_DIR,
    maxLogChars: process.env.SANDBOX_MAX_LOG_CHARS,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(
      `Sandbox config error: ${result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      { issues: result.error.issues },
    );
  }

  const config = result.data;
  if (config.logDir) {
    config.logDir = resolve(expandHome(config.logDir));
  }

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}
