/**
 * Entry type of the JSONL execution audit log (daily rotation).
 */

import type { BaseAuditEntry } from '@pysandbox/shared/Logging/jsonl.js';

export interface ExecutionLogEntry extends BaseAuditEntry {
  type: 'execution';
  execution_id: string;
  code: string;
  output: string;
  success: boolean;
  error: string | null;
  timed_out: boolean;
  timeout_seconds: number;
  duration_ms: number;
  staged_files: string[];
  truncated: boolean;
}
