/**
 * Output Capture — one redirection window per request.
 *
 * `restore()` puts the original streams back exactly once: the first call
 * releases the interpreter streams and returns what was buffered, every later
 * call is a no-op returning empty text. Output from one request therefore can
 * neither leak into nor be lost from the next one.
 */

import type { CapturedOutput, GuestStreams } from '../runtime/types.js';

type CaptureState = 'idle' | 'installed' | 'restored';

const EMPTY: CapturedOutput = { stdout: '', stderr: '' };

export class OutputCapture {
  private state: CaptureState = 'idle';

  constructor(private readonly streams: GuestStreams) {}

  get isInstalled(): boolean {
    return this.state === 'installed';
  }

  install(): void {
    if (this.state !== 'idle') {
      throw new Error(`Output capture cannot be installed from state "${this.state}"`);
    }
    // Marked first: a redirect that throws halfway still needs restoring.
    this.state = 'installed';
    this.streams.redirect();
  }

  restore(): CapturedOutput {
    if (this.state !== 'installed') {
      this.state = 'restored';
      return { ...EMPTY };
    }
    this.state = 'restored';
    return this.streams.release();
  }
}
