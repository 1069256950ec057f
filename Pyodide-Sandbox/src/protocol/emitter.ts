/**
 * Writes results to the control channel, one compact JSON document per line.
 */

import type { Writable } from 'node:stream';
import { describeError } from '@pysandbox/shared/Types/errors.js';
import { FatalTransportError, isFatalTransportError } from '../errors.js';
import type { ExecutionResult } from '../executor/types.js';

export function serializeResult(result: ExecutionResult): string {
  return `${JSON.stringify({
    success: result.success,
    output: result.output,
    error: result.error,
    logs: result.logs,
  })}\n`;
}

export class ResponseEmitter {
  constructor(private readonly output: Writable) {}

  /**
   * Resolves once the line has been handed to the stream. A closed or broken
   * channel rejects with FatalTransportError.
   */
  emit(result: ExecutionResult): Promise<void> {
    const line = serializeResult(result);
    return new Promise<void>((resolve, reject) => {
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new FatalTransportError('Output stream is closed'));
        return;
      }
      this.output.write(line, (error) => {
        if (!error) {
          resolve();
          return;
        }
        if (isFatalTransportError(error)) {
          reject(new FatalTransportError(`Output stream failed: ${describeError(error)}`, { cause: error }));
          return;
        }
        reject(error);
      });
    });
  }
}
