/**
 * Request decoding: one JSON line → one validated, tagged request.
 *
 * Wire shape (field names as the host sends them):
 *   {"type":"execute","code":"...","files":{...},"timeout":5}
 *   {"type":"writeFile","path":"...","content":"..."}
 *   {"type":"readFile","path":"..."}
 */

import { z } from 'zod';
import { TransportError } from '../errors.js';
import type { ExecutionRequest } from '../executor/types.js';

export const executeSchema = z.object({
  code: z.string(),
  files: z.record(z.string(), z.string()).nullish(),
  timeout: z.number().nullish(),
});

export const writeFileSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export const readFileSchema = z.object({
  path: z.string().min(1),
});

type RequestKind = ExecutionRequest['kind'];

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decide the request kind. A missing or unrecognised `type` means execute:
 * older hosts send bare `{"code": ...}` lines.
 */
export function normalizeKind(raw: Record<string, unknown>): RequestKind {
  if (raw.type === 'writeFile' || raw.type === 'readFile') {
    return raw.type;
  }
  return 'execute';
}

/**
 * @throws TransportError with the message to report back to the host
 */
export function parseRequestLine(line: string): ExecutionRequest {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Failed to parse request: ${message}`);
  }

  if (!isRecord(raw)) {
    throw new TransportError('Failed to parse request: expected a JSON object');
  }

  const kind = normalizeKind(raw);
  switch (kind) {
    case 'writeFile': {
      const parsed = writeFileSchema.safeParse(raw);
      if (!parsed.success) {
        throw new TransportError(`Invalid writeFile request: ${formatIssues(parsed.error)}`);
      }
      return { kind, path: parsed.data.path, content: parsed.data.content };
    }
    case 'readFile': {
      const parsed = readFileSchema.safeParse(raw);
      if (!parsed.success) {
        throw new TransportError(`Invalid readFile request: ${formatIssues(parsed.error)}`);
      }
      return { kind, path: parsed.data.path };
    }
    case 'execute': {
      if (raw.code === undefined || raw.code === null || raw.code === '') {
        throw new TransportError('No code provided for execution');
      }
      const parsed = executeSchema.safeParse(raw);
      if (!parsed.success) {
        throw new TransportError(`Invalid execute request: ${formatIssues(parsed.error)}`);
      }
      return {
        kind,
        code: parsed.data.code,
        ...(parsed.data.files ? { files: parsed.data.files } : {}),
        ...(typeof parsed.data.timeout === 'number' ? { timeoutSeconds: parsed.data.timeout } : {}),
      };
    }
  }
}
