/**
 * Port between the worker and the hosted interpreter.
 *
 * The Pyodide adapter implements it for production; tests provide an
 * in-process fake so the executor and dispatcher can run without WebAssembly.
 */

export type RuntimeState = 'uninitialized' | 'initializing' | 'ready';

/**
 * Subset of the Emscripten filesystem the worker needs. Calls throw on failure.
 */
export interface GuestFileSystem {
  mkdirTree(path: string): void;
  writeFile(path: string, content: string): void;
  readFile(path: string, options: { encoding: 'utf8' }): string;
}

export interface CapturedOutput {
  stdout: string;
  stderr: string;
}

/**
 * Low-level stdout/stderr redirection inside the interpreter.
 */
export interface GuestStreams {
  /** Swap the live streams for in-memory buffers, remembering the originals. */
  redirect(): void;
  /**
   * Return what the buffers hold and put the originals back. Has to work when
   * `redirect()` failed halfway or never ran.
   */
  release(): CapturedOutput;
}

export interface GuestInterpreter {
  readonly fs: GuestFileSystem;
  readonly streams: GuestStreams;
  /**
   * Run guest code. Resolves with the textual form of the trailing expression,
   * or undefined when it is None/absent. Guest exceptions reject with a
   * `GuestError`. When `signal` aborts, the run is cancelled at its next
   * checkpoint (an `await` in the guest).
   */
  run(code: string, signal: AbortSignal): Promise<string | undefined>;
}

/** Performs the expensive one-time construction of an interpreter. */
export type InterpreterLoader = () => Promise<GuestInterpreter>;
