/**
 * Head+tail truncation for text that goes into the audit log.
 *
 * Keeps the start (usually the interesting part of code or output) and the
 * end (usually the traceback or final result) with a marker in between.
 */

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export function truncateOutput(text: string, maxChars: number): TruncateResult {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }

  const head = Math.floor(maxChars / 2);
  const tail = maxChars - head;
  const dropped = text.length - head - tail;
  const marker = `\n[... truncated ${dropped} characters ...]\n`;

  return {
    text: text.slice(0, head) + marker + (tail > 0 ? text.slice(-tail) : ''),
    truncated: true,
  };
}
