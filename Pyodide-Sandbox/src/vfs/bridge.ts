/**
 * Virtual Filesystem Bridge — staging files into the interpreter's private
 * in-memory filesystem. Nothing here touches the host disk.
 */

import { posix } from 'node:path';
import { describeError } from '@pysandbox/shared/Types/errors.js';
import { FileIOError } from '../errors.js';
import type { GuestFileSystem } from '../runtime/types.js';

export class VirtualFileSystem {
  constructor(private readonly fs: GuestFileSystem) {}

  /**
   * Write `content` to `path`, creating missing parent directories.
   * Existing files are overwritten in place.
   */
  writeFile(path: string, content: string): void {
    try {
      const dir = posix.dirname(path);
      if (dir !== '.' && dir !== '/') {
        this.fs.mkdirTree(dir);
      }
      this.fs.writeFile(path, content);
    } catch (error) {
      throw new FileIOError(`Failed to write file ${path}: ${describeFsError(error)}`, path, {
        cause: error,
      });
    }
  }

  readFile(path: string): string {
    try {
      return this.fs.readFile(path, { encoding: 'utf8' });
    } catch (error) {
      throw new FileIOError(`Failed to read file ${path}: ${describeFsError(error)}`, path, {
        cause: error,
      });
    }
  }

  /**
   * Stage a request's `files` mapping. Failures are reported per file and do
   * not stop the remaining writes.
   *
   * @returns one log line per file, in mapping order
   */
  stageFiles(files: Record<string, string>): string[] {
    const logs: string[] = [];
    for (const [path, content] of Object.entries(files)) {
      try {
        this.writeFile(path, content);
        logs.push(`Wrote file: ${path}`);
      } catch (error) {
        logs.push(describeError(error));
      }
    }
    return logs;
  }
}

/**
 * Emscripten throws ErrnoError objects whose message is often empty; fall
 * back to the errno code so the log line still says something.
 */
function describeFsError(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === 'object' && error !== null && 'errno' in error) {
    return `errno ${String(error.errno)}`;
  }
  return describeError(error);
}
