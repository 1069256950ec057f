/**
 * Pyodide-backed implementation of the interpreter port.
 *
 * Pyodide runs CPython compiled to WebAssembly inside this Node process, so
 * guest code shares the host event loop. Each run is an asyncio task owned by
 * the worker: the deadline cancels that task, and the guest sees
 * `CancelledError` at its next `await`. A synchronous tight loop holds the
 * event loop and runs to the end.
 *
 * Output capture is routed through a context variable rather than by swapping
 * `sys.stdout` per request. A task inherits the capture buffers of the request
 * that started it, so a run abandoned after its deadline (or a background task
 * it spawned) can never write into a later request's output.
 */

import { createRequire } from 'node:module';
import { dirname, sep } from 'node:path';
import { loadPyodide, type PyodideInterface } from 'pyodide';
import type { PyDict } from 'pyodide/ffi';
import { Logger } from '@pysandbox/shared/Utils/logger.js';
import { describeError } from '@pysandbox/shared/Types/errors.js';
import { GuestError } from '../errors.js';
import type {
  CapturedOutput,
  GuestFileSystem,
  GuestInterpreter,
  GuestStreams,
  InterpreterLoader,
} from './types.js';

// Runs once per interpreter in a private namespace; nothing here is visible
// to guest globals.
const SETUP_SOURCE = `
import __main__
import asyncio
import contextvars
import io
import sys
import traceback
from pyodide.code import eval_code_async

_main_globals = __main__.__dict__
_sink = contextvars.ContextVar("sandbox_capture", default=None)
_current = None
_abandoned = set()


class _Router(io.TextIOBase):
    def __init__(self, index, fallback):
        self._index = index
        self._fallback = fallback

    @property
    def encoding(self):
        return "utf-8"

    def writable(self):
        return True

    def write(self, text):
        buffers = _sink.get()
        if buffers is None or buffers[self._index].closed:
            return self._fallback.write(text)
        return buffers[self._index].write(text)

    def flush(self):
        self._fallback.flush()


sys.stdout = _Router(0, sys.stdout)
sys.stderr = _Router(1, sys.stderr)


def _guest_traceback(exc):
    tb = exc.__traceback__
    while tb is not None and tb.tb_frame.f_globals is not _main_globals:
        tb = tb.tb_next
    return "".join(traceback.format_exception(type(exc), exc, tb))


async def _run_guest(source):
    try:
        value = await eval_code_async(source, _main_globals, filename="<exec>")
    except BaseException as exc:
        return ("error", type(exc).__name__, _guest_traceback(exc))
    return ("ok", "", None if value is None else str(value))


def _cancel_current():
    if _current is not None and not _current.done():
        _current.cancel()
        _abandoned.add(_current)


def _cancel_abandoned():
    for task in list(_abandoned):
        if task.done():
            _abandoned.discard(task)
        else:
            task.cancel()
`;

const REDIRECT_SOURCE = `
from io import StringIO
_sink.set((StringIO(), StringIO()))
`;

const RELEASE_SOURCE = `
_buffers = _sink.get()
_sink.set(None)
captured = ("", "")
if _buffers is not None:
    captured = tuple(b.getvalue() for b in _buffers)
    for b in _buffers:
        b.close()
del _buffers
captured
`;

const RUN_SOURCE = `
_current = asyncio.ensure_future(_run_guest(_source))
await _current
`;

export interface PyodideLoaderOptions {
  /** Packages from the Pyodide distribution to load during warm-up. */
  packages: string[];
  /** Where Pyodide's assets live; defaults to the installed npm package. */
  indexURL?: string;
  logger?: Logger;
}

/**
 * Directory of the installed pyodide package (its entry files sit at the
 * package root). Pyodide otherwise guesses it from a stack trace, which points
 * elsewhere under test runners and bundlers.
 */
export function installedIndexURL(): string {
  const require = createRequire(import.meta.url);
  return `${dirname(require.resolve('pyodide'))}${sep}`;
}

/** Converts a Python tuple result into its JS items. */
function tupleItems(pyodide: PyodideInterface, value: unknown): unknown[] {
  if (!(value instanceof pyodide.ffi.PyProxy)) return [];
  try {
    const items: unknown = value.toJs();
    return Array.isArray(items) ? items : [];
  } finally {
    value.destroy();
  }
}

class PyodideFileSystem implements GuestFileSystem {
  constructor(private readonly pyodide: PyodideInterface) {}

  mkdirTree(path: string): void {
    this.pyodide.FS.mkdirTree(path);
  }

  writeFile(path: string, content: string): void {
    this.pyodide.FS.writeFile(path, content);
  }

  readFile(path: string, options: { encoding: 'utf8' }): string {
    const content: unknown = this.pyodide.FS.readFile(path, options);
    if (typeof content === 'string') return content;
    if (content instanceof Uint8Array) return Buffer.from(content).toString('utf8');
    throw new Error(`Unexpected content type for ${path}`);
  }
}

class PyodideStreams implements GuestStreams {
  constructor(
    private readonly pyodide: PyodideInterface,
    private readonly scope: PyDict,
  ) {}

  redirect(): void {
    this.pyodide.runPython(REDIRECT_SOURCE, { globals: this.scope });
  }

  release(): CapturedOutput {
    const [stdout, stderr] = tupleItems(
      this.pyodide,
      this.pyodide.runPython(RELEASE_SOURCE, { globals: this.scope }),
    );
    return {
      stdout: typeof stdout === 'string' ? stdout : '',
      stderr: typeof stderr === 'string' ? stderr : '',
    };
  }
}

export class PyodideInterpreter implements GuestInterpreter {
  readonly fs: GuestFileSystem;
  readonly streams: GuestStreams;

  constructor(
    private readonly pyodide: PyodideInterface,
    private readonly scope: PyDict,
    private readonly logger: Logger,
  ) {
    this.fs = new PyodideFileSystem(pyodide);
    this.streams = new PyodideStreams(pyodide, scope);
  }

  async run(code: string, signal: AbortSignal): Promise<string | undefined> {
    // Runs that ignored their cancellation get cancelled again at every later run.
    this.pyodide.runPython('_cancel_abandoned()', { globals: this.scope });
    this.scope.set('_source', code);

    const execution: Promise<unknown> = this.pyodide.runPythonAsync(RUN_SOURCE, {
      globals: this.scope,
    });

    const onAbort = (): void => {
      try {
        this.pyodide.runPython('_cancel_current()', { globals: this.scope });
      } catch (error) {
        this.logger.error(`Failed to cancel execution: ${describeError(error)}`);
      }
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const [status, kind, text] = tupleItems(this.pyodide, await execution);
      if (status === 'error') {
        throw new GuestError(
          typeof kind === 'string' ? kind : 'Exception',
          typeof text === 'string' ? text : '',
        );
      }
      return typeof text === 'string' ? text : undefined;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Build the loader that constructs Pyodide, preloads the package set and
 * installs the capture router. Guest output produced outside a capture window
 * goes to the diagnostic log, never to the protocol stream.
 */
export function createPyodideLoader(options: PyodideLoaderOptions): InterpreterLoader {
  const log = (options.logger ?? new Logger('sandbox')).child('pyodide');

  return async () => {
    const pyodide = await loadPyodide({
      indexURL: options.indexURL ?? installedIndexURL(),
      stdout: (text: string) => log.debug(`guest stdout: ${text}`),
      stderr: (text: string) => log.debug(`guest stderr: ${text}`),
    });

    if (options.packages.length > 0) {
      log.info(`Loading packages: ${options.packages.join(', ')}`);
      await pyodide.loadPackage(options.packages, {
        messageCallback: (message: string) => log.debug(message),
        errorCallback: (message: string) => log.warn(message),
      });
    }

    const scope: PyDict = pyodide.toPy({});
    pyodide.runPython(SETUP_SOURCE, { globals: scope });

    return new PyodideInterpreter(pyodide, scope, log);
  };
}
