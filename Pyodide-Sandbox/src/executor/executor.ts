/**
 * Executor — the lifecycle of one `execute` request:
 * install capture → stage files → run against the deadline → restore
 * capture → classify the outcome.
 */

import { randomUUID } from 'node:crypto';
import { Logger } from '@pysandbox/shared/Utils/logger.js';
import { describeError } from '@pysandbox/shared/Types/errors.js';
import { OutputCapture } from '../capture/output-capture.js';
import { VirtualFileSystem } from '../vfs/bridge.js';
import { ExecutionTimeoutError, GuestError, SandboxError } from '../errors.js';
import { runWithDeadline, type BoundedOutcome } from './bounded.js';
import { errorResult, successResult } from './types.js';
import type { RuntimeManager } from '../runtime/manager.js';
import type { CapturedOutput } from '../runtime/types.js';
import type { ExecutionRecorder } from '../logging/writer.js';
import type { ExecuteRequest, ExecutionResult } from './types.js';

/**
 * Built-in exception kinds whose traceback is returned verbatim. Anything
 * else is prefixed with `PythonError:`.
 */
const NATIVE_ERROR_KINDS = new Set([
  'SyntaxError',
  'IndentationError',
  'NameError',
  'TypeError',
  'ValueError',
  'AttributeError',
  'KeyError',
  'IndexError',
  'ZeroDivisionError',
]);

export interface ExecutorOptions {
  defaultTimeoutSeconds: number;
  maxTimeoutSeconds: number;
  interruptGraceMs: number;
}

export interface ExecutorDeps {
  logger?: Logger;
  recorder?: ExecutionRecorder;
}

function isUsableTimeout(requested: number | undefined): requested is number {
  return requested !== undefined && Number.isFinite(requested) && requested > 0;
}

/**
 * Absent, non-positive and non-finite values get the default; anything above
 * the maximum is clamped to it.
 */
export function resolveTimeoutSeconds(
  requested: number | undefined,
  options: Pick<ExecutorOptions, 'defaultTimeoutSeconds' | 'maxTimeoutSeconds'>,
): number {
  if (!isUsableTimeout(requested)) {
    return options.defaultTimeoutSeconds;
  }
  return Math.min(requested, options.maxTimeoutSeconds);
}

/**
 * Append the trailing expression's text to captured stdout, adding a newline
 * first when the output does not already end with one.
 */
export function appendTrailingValue(output: string, value: string | undefined): string {
  if (value === undefined) return output;
  const separator = output && !output.endsWith('\n') ? '\n' : '';
  return `${output}${separator}${value}`;
}

export function describeFailure(error: unknown): string {
  if (error instanceof GuestError) {
    return NATIVE_ERROR_KINDS.has(error.kind) ? error.message : `PythonError: ${error.message}`;
  }
  return describeError(error);
}

export class Executor {
  private readonly logger: Logger;
  private readonly recorder: ExecutionRecorder | undefined;

  constructor(
    private readonly runtime: RuntimeManager,
    private readonly options: ExecutorOptions,
    deps: ExecutorDeps = {},
  ) {
    this.logger = (deps.logger ?? new Logger('sandbox')).child('executor');
    this.recorder = deps.recorder;
  }

  /**
   * Run one request. Rejects only when the interpreter cannot be built;
   * every guest or staging failure becomes an error result.
   */
  async execute(request: ExecuteRequest): Promise<ExecutionResult> {
    // First request absorbs the cold start when the worker was not pre-warmed.
    const interpreter = await this.runtime.initialize();

    const executionId = `exec_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
    const timeoutSeconds = resolveTimeoutSeconds(request.timeoutSeconds, this.options);
    // The timeout message names what the caller asked for, even when clamped.
    const requestedSeconds = isUsableTimeout(request.timeoutSeconds)
      ? request.timeoutSeconds
      : timeoutSeconds;
    const capture = new OutputCapture(interpreter.streams);
    const vfs = new VirtualFileSystem(interpreter.fs);
    const logs: string[] = [];
    const startedAt = Date.now();

    this.logger.debug(`Starting ${executionId}`, {
      timeout_seconds: timeoutSeconds,
      requested_timeout_seconds: requestedSeconds,
      files: request.files ? Object.keys(request.files).length : 0,
    });

    let outcome: BoundedOutcome;
    let captured: CapturedOutput = { stdout: '', stderr: '' };
    try {
      capture.install();
      if (request.files) {
        logs.push(...vfs.stageFiles(request.files));
      }
      outcome = await runWithDeadline(interpreter, request.code, {
        timeoutMs: timeoutSeconds * 1000,
        graceMs: this.options.interruptGraceMs,
      });
    } catch (error) {
      outcome = {
        status: 'failed',
        error: new SandboxError(`Sandbox execution failed: ${describeError(error)}`, {
          cause: error,
        }),
      };
    } finally {
      captured = this.restore(capture, logs);
    }

    if (captured.stderr) {
      logs.push(captured.stderr);
    }

    const result = this.toResult(outcome, captured.stdout, logs, requestedSeconds, executionId);
    const durationMs = Date.now() - startedAt;
    this.logger.debug(`Finished ${executionId} in ${durationMs}ms`, { status: outcome.status });

    if (this.recorder) {
      this.recorder
        .record({
          executionId,
          code: request.code,
          result,
          timedOut: outcome.status === 'timed_out',
          timeoutSeconds,
          durationMs,
          stagedFiles: request.files ? Object.keys(request.files) : [],
        })
        .catch((err: unknown) => this.logger.error(`Audit log write failed: ${describeError(err)}`));
    }

    return result;
  }

  private restore(capture: OutputCapture, logs: string[]): CapturedOutput {
    try {
      return capture.restore();
    } catch (error) {
      this.logger.error('Failed to restore output streams', error);
      logs.push(`Failed to restore output streams: ${describeError(error)}`);
      return { stdout: '', stderr: '' };
    }
  }

  private toResult(
    outcome: BoundedOutcome,
    stdout: string,
    logs: string[],
    requestedSeconds: number,
    executionId: string,
  ): ExecutionResult {
    switch (outcome.status) {
      case 'completed':
        return successResult(appendTrailingValue(stdout, outcome.value), logs);
      case 'timed_out':
        if (!outcome.acknowledged) {
          this.logger.warn(
            `${executionId} did not stop within ${this.options.interruptGraceMs}ms`,
          );
        }
        return errorResult(new ExecutionTimeoutError(requestedSeconds).message, stdout, logs);
      case 'failed':
        return errorResult(describeFailure(outcome.error), stdout, logs);
    }
  }
}
