/**
 * Execution audit log: one JSONL entry per executed request, rotated daily
 * as `executions-YYYY-MM-DD.jsonl` under the configured log directory.
 */

import {
  JsonlLogger,
  createTimestamp,
  dailyJsonlPath,
} from '@pysandbox/shared/Logging/jsonl.js';
import { truncateOutput } from '../utils/output-truncate.js';
import type { ExecutionResult } from '../executor/types.js';
import type { ExecutionLogEntry } from './types.js';

export interface ExecutionRecord {
  executionId: string;
  code: string;
  result: ExecutionResult;
  timedOut: boolean;
  timeoutSeconds: number;
  durationMs: number;
  stagedFiles: string[];
}

export interface ExecutionRecorder {
  record(record: ExecutionRecord): Promise<void>;
}

export class ExecutionAuditLog implements ExecutionRecorder {
  private readonly jsonl: JsonlLogger<ExecutionLogEntry>;

  constructor(
    logDir: string,
    private readonly maxChars: number,
  ) {
    this.jsonl = new JsonlLogger<ExecutionLogEntry>(dailyJsonlPath(logDir, 'executions'));
  }

  async record(record: ExecutionRecord): Promise<void> {
    const code = truncateOutput(record.code, this.maxChars);
    const output = truncateOutput(record.result.output, this.maxChars);

    await this.jsonl.write({
      type: 'execution',
      timestamp: createTimestamp(),
      execution_id: record.executionId,
      code: code.text,
      output: output.text,
      success: record.result.success,
      error: record.result.error,
      timed_out: record.timedOut,
      timeout_seconds: record.timeoutSeconds,
      duration_ms: record.durationMs,
      staged_files: record.stagedFiles,
      truncated: code.truncated || output.truncated,
    });
  }

  getPath(at?: Date): string {
    return this.jsonl.getPath(at);
  }
}
