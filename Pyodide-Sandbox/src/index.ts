#!/usr/bin/env node
/**
 * Pyodide Sandbox — Entry Point
 *
 * Line-delimited JSON over stdio, spawned by a host process. stdout carries
 * results only; every diagnostic goes to stderr.
 */

import { loadEnvSafely } from '@pysandbox/shared/Utils/env.js';

// dist/src/index.js → package root
loadEnvSafely(import.meta.url, 2);

import { Logger } from '@pysandbox/shared/Utils/logger.js';
import { getConfig } from './config.js';
import { RuntimeManager } from './runtime/manager.js';
import { createPyodideLoader } from './runtime/pyodide.js';
import { Executor } from './executor/executor.js';
import { ExecutionAuditLog } from './logging/writer.js';
import { ResponseEmitter } from './protocol/emitter.js';
import { Dispatcher } from './protocol/dispatcher.js';
import { errorResult } from './executor/types.js';
import { RuntimeInitializationError } from './errors.js';

const logger = new Logger('pyodide-sandbox');

async function main(): Promise<void> {
  const config = getConfig();

  logger.info('Starting Pyodide sandbox', {
    transport: 'stdio',
    packages: config.packages,
    default_timeout_s: config.defaultTimeoutSeconds,
    max_timeout_s: config.maxTimeoutSeconds,
  });

  const runtime = new RuntimeManager(
    createPyodideLoader({
      packages: config.packages,
      indexURL: config.pyodideIndexUrl,
      logger,
    }),
    logger,
  );

  const recorder = config.logDir
    ? new ExecutionAuditLog(config.logDir, config.maxLogChars)
    : undefined;
  if (recorder) {
    logger.info(`Audit log: ${recorder.getPath()}`);
  }

  const executor = new Executor(
    runtime,
    {
      defaultTimeoutSeconds: config.defaultTimeoutSeconds,
      maxTimeoutSeconds: config.maxTimeoutSeconds,
      interruptGraceMs: config.interruptGraceMs,
    },
    { logger, recorder },
  );
  const emitter = new ResponseEmitter(process.stdout);
  const dispatcher = new Dispatcher(executor, runtime, emitter, logger);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down (${dispatcher.handledCount} requests served)`);
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  // Warm the interpreter before the first request arrives.
  try {
    await runtime.initialize();
  } catch (error) {
    if (error instanceof RuntimeInitializationError) {
      await emitter.emit(errorResult(error.message));
    }
    throw error;
  }

  await dispatcher.run(process.stdin);
  logger.info(`Served ${dispatcher.handledCount} requests`);
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
