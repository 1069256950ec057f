/**
 * Request Dispatcher — the worker's main loop.
 *
 * Reads the control channel line by line and answers each non-empty line with
 * exactly one result before reading the next. Only input EOF, a broken
 * channel, or a failed interpreter build ends the loop.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { Logger } from '@pysandbox/shared/Utils/logger.js';
import { describeError } from '@pysandbox/shared/Types/errors.js';
import {
  FileIOError,
  RuntimeInitializationError,
  TransportError,
  isFatalTransportError,
} from '../errors.js';
import { errorResult, successResult } from '../executor/types.js';
import { VirtualFileSystem } from '../vfs/bridge.js';
import { parseRequestLine } from './requests.js';
import type { Executor } from '../executor/executor.js';
import type { ExecutionRequest, ExecutionResult } from '../executor/types.js';
import type { RuntimeManager } from '../runtime/manager.js';
import type { ResponseEmitter } from './emitter.js';

export class Dispatcher {
  private readonly logger: Logger;
  private handled = 0;

  constructor(
    private readonly executor: Executor,
    private readonly runtime: RuntimeManager,
    private readonly emitter: ResponseEmitter,
    logger: Logger = new Logger('sandbox'),
  ) {
    this.logger = logger.child('dispatcher');
  }

  /** Number of request lines answered so far. */
  get handledCount(): number {
    return this.handled;
  }

  /**
   * Serve requests from `input` until it ends.
   *
   * @throws RuntimeInitializationError after its error result has been emitted
   */
  async run(input: Readable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        if (line.trim() === '') continue;

        let result: ExecutionResult;
        try {
          result = await this.handleLine(line);
        } catch (error) {
          if (error instanceof RuntimeInitializationError) {
            await this.send(errorResult(error.message));
          }
          throw error;
        }
        await this.send(result);
        this.handled++;
      }
      this.logger.info('Stdin closed, exiting...');
    } catch (error) {
      if (isFatalTransportError(error)) {
        this.logger.error('Control channel lost, stopping', error);
        return;
      }
      throw error;
    } finally {
      lines.close();
    }
  }

  /**
   * Decode and serve one line. Every failure except a runtime build failure
   * comes back as an error result.
   */
  async handleLine(line: string): Promise<ExecutionResult> {
    let request: ExecutionRequest;
    try {
      request = parseRequestLine(line);
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger.warn(error.message);
        return errorResult(error.message);
      }
      throw error;
    }

    try {
      return await this.route(request);
    } catch (error) {
      if (error instanceof RuntimeInitializationError || isFatalTransportError(error)) {
        throw error;
      }
      this.logger.error(`Failed to process ${request.kind} request`, error);
      return errorResult(`Failed to process request: ${describeError(error)}`);
    }
  }

  /**
   * Emit one result. Only a lost channel propagates; any other write failure
   * drops this result and the loop moves on to the next line.
   */
  private async send(result: ExecutionResult): Promise<void> {
    try {
      await this.emitter.emit(result);
    } catch (error) {
      if (isFatalTransportError(error)) throw error;
      this.logger.error('Failed to write result', error);
    }
  }

  private async route(request: ExecutionRequest): Promise<ExecutionResult> {
    switch (request.kind) {
      case 'execute':
        return this.executor.execute(request);
      case 'writeFile': {
        const vfs = await this.filesystem();
        try {
          vfs.writeFile(request.path, request.content);
        } catch (error) {
          if (error instanceof FileIOError) return errorResult(error.message);
          throw error;
        }
        this.logger.debug(`Wrote ${request.path}`, { bytes: Buffer.byteLength(request.content) });
        return successResult(`File written to ${request.path}`);
      }
      case 'readFile': {
        const vfs = await this.filesystem();
        try {
          return successResult(vfs.readFile(request.path));
        } catch (error) {
          if (error instanceof FileIOError) return errorResult(error.message);
          throw error;
        }
      }
    }
  }

  private async filesystem(): Promise<VirtualFileSystem> {
    const interpreter = await this.runtime.initialize();
    return new VirtualFileSystem(interpreter.fs);
  }
}
