/**
 * Runtime Manager — owns the single warm interpreter of the process.
 *
 * The interpreter is built once and never reset: names bound and files
 * written by one request stay visible to every later request. That reuse is
 * what keeps requests fast after the first; do not add per-request resets.
 */

import { Logger } from '@pysandbox/shared/Utils/logger.js';
import { describeError } from '@pysandbox/shared/Types/errors.js';
import { RuntimeInitializationError } from '../errors.js';
import type { GuestInterpreter, InterpreterLoader, RuntimeState } from './types.js';

export class RuntimeManager {
  private state: RuntimeState = 'uninitialized';
  private interpreter: GuestInterpreter | null = null;
  private pending: Promise<GuestInterpreter> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly loader: InterpreterLoader,
    logger: Logger = new Logger('sandbox'),
  ) {
    this.logger = logger.child('runtime');
  }

  getState(): RuntimeState {
    return this.state;
  }

  /**
   * Build the interpreter on first call; every later or concurrent call gets
   * the same instance. A failed first build rejects with
   * RuntimeInitializationError and leaves the manager uninitialized.
   */
  initialize(): Promise<GuestInterpreter> {
    if (this.interpreter) return Promise.resolve(this.interpreter);
    if (this.pending) return this.pending;

    this.state = 'initializing';
    const startedAt = Date.now();
    this.logger.info('Initializing interpreter...');

    this.pending = this.loader().then(
      (interpreter) => {
        this.interpreter = interpreter;
        this.state = 'ready';
        this.pending = null;
        this.logger.info(`Interpreter ready in ${Date.now() - startedAt}ms`);
        return interpreter;
      },
      (error: unknown) => {
        this.state = 'uninitialized';
        this.pending = null;
        this.logger.error('Failed to initialize interpreter', error);
        throw new RuntimeInitializationError(
          `Failed to initialize interpreter: ${describeError(error)}`,
          { cause: error },
        );
      },
    );
    return this.pending;
  }
}
