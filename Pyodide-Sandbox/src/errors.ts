/**
 * Error taxonomy of the worker. Everything except FatalTransportError and
 * RuntimeInitializationError is turned into a result at the request boundary.
 */

import { BaseError, TimeoutError } from '@pysandbox/shared/Types/errors.js';

/** A request line that could not be decoded or validated. */
export class TransportError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSPORT_ERROR', details);
    this.name = 'TransportError';
  }
}

/** The control channel itself is gone (broken pipe, reset, destroyed stream). */
export class FatalTransportError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'FATAL_TRANSPORT_ERROR', details);
    this.name = 'FatalTransportError';
  }
}

/** A virtual filesystem read or write failed. */
export class FileIOError extends BaseError {
  constructor(
    message: string,
    public readonly path: string,
    details?: unknown,
  ) {
    super(message, 'FILE_IO_ERROR', details);
    this.name = 'FileIOError';
  }
}

export class ExecutionTimeoutError extends TimeoutError {
  constructor(public readonly seconds: number) {
    super(`Execution timed out after ${seconds} seconds`, { seconds });
    this.name = 'ExecutionTimeoutError';
  }
}

/**
 * An exception raised by guest code inside the interpreter.
 * `kind` is the exception class name (e.g. `ZeroDivisionError`) and the
 * message is the interpreter's full traceback text.
 */
export class GuestError extends BaseError {
  constructor(
    public readonly kind: string,
    traceback: string,
  ) {
    super(traceback, 'INTERPRETER_ERROR', { kind });
    this.name = 'GuestError';
  }
}

/** Something on the host side of an execution broke (not guest code). */
export class SandboxError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'SANDBOX_ERROR', details);
    this.name = 'SandboxError';
  }
}

export class RuntimeInitializationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'RUNTIME_INIT_ERROR', details);
    this.name = 'RuntimeInitializationError';
  }
}

const FATAL_TRANSPORT_CODES = new Set([
  'EPIPE',
  'ECONNRESET',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

/**
 * True when an I/O error means the host on the other end of stdio is gone.
 */
export function isFatalTransportError(error: unknown): boolean {
  if (error instanceof FatalTransportError) return true;
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return FATAL_TRANSPORT_CODES.has(error.code);
  }
  return false;
}
