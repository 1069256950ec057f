/**
 * Append-only JSONL (JSON Lines) audit writer with optional daily rotation.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * All audit entries carry an ISO timestamp.
 */
export interface BaseAuditEntry {
  timestamp: string;
  [key: string]: unknown;
}

/** Maps the moment of a write to the file it should land in. */
export type JsonlPathResolver = (at: Date) => string;

/**
 * Resolver producing `<dir>/<prefix>-YYYY-MM-DD.jsonl` (UTC date).
 */
export function dailyJsonlPath(dir: string, prefix: string): JsonlPathResolver {
  return (at) => join(dir, `${prefix}-${at.toISOString().slice(0, 10)}.jsonl`);
}

/**
 * @example
 * ```typescript
 * interface RunEntry extends BaseAuditEntry {
 *   execution_id: string;
 *   success: boolean;
 * }
 *
 * const audit = new JsonlLogger<RunEntry>(dailyJsonlPath('/tmp/audit', 'executions'));
 * await audit.write({ timestamp: createTimestamp(), execution_id: 'exec_1', success: true });
 * ```
 */
export class JsonlLogger<T extends BaseAuditEntry> {
  private resolvePath: JsonlPathResolver;
  private createdDirs = new Set<string>();

  constructor(target: string | JsonlPathResolver) {
    this.resolvePath = typeof target === 'string' ? () => target : target;
  }

  private async ensureDir(path: string): Promise<void> {
    const dir = dirname(path);
    if (this.createdDirs.has(dir)) return;
    await mkdir(dir, { recursive: true });
    this.createdDirs.add(dir);
  }

  /**
   * Append one entry. The file is chosen from the entry's timestamp so a
   * rotated log never mixes days.
   *
   * @returns the file the entry was appended to
   */
  async write(entry: T): Promise<string> {
    const at = new Date(entry.timestamp);
    const path = this.resolvePath(Number.isNaN(at.getTime()) ? new Date() : at);
    await this.ensureDir(path);
    await appendFile(path, JSON.stringify(entry) + '\n', 'utf-8');
    return path;
  }

  /**
   * Get the file an entry written at `at` would go to.
   */
  getPath(at: Date = new Date()): string {
    return this.resolvePath(at);
  }
}

/**
 * Create a timestamped audit entry
 */
export function createTimestamp(): string {
  return new Date().toISOString();
}
