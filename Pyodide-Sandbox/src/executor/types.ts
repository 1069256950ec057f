/**
 * Core request/result types of the worker.
 */

export interface ExecuteRequest {
  kind: 'execute';
  code: string;
  /** Files staged into the virtual filesystem before the code runs. */
  files?: Record<string, string>;
  /** Raw timeout from the wire; the executor decides the effective value. */
  timeoutSeconds?: number;
}

export interface WriteFileRequest {
  kind: 'writeFile';
  path: string;
  content: string;
}

export interface ReadFileRequest {
  kind: 'readFile';
  path: string;
}

export type ExecutionRequest = ExecuteRequest | WriteFileRequest | ReadFileRequest;

/**
 * Exactly one of these is written per request line. `success: false` always
 * comes with a non-null `error`.
 */
export interface ExecutionResult {
  success: boolean;
  output: string;
  error: string | null;
  logs: string[];
}

export function successResult(output: string, logs: string[] = []): ExecutionResult {
  return { success: true, output, error: null, logs };
}

export function errorResult(error: string, output = '', logs: string[] = []): ExecutionResult {
  return { success: false, output, error, logs };
}
