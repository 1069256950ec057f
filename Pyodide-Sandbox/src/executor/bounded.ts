/**
 * Bounded execution: guest code racing a deadline timer, reported as a
 * tri-state outcome instead of a thrown timeout.
 */

import type { GuestInterpreter } from '../runtime/types.js';

export type BoundedOutcome =
  | { status: 'completed'; value: string | undefined }
  | { status: 'timed_out'; acknowledged: boolean }
  | { status: 'failed'; error: unknown };

export interface DeadlineOptions {
  timeoutMs: number;
  /** How long to wait for the guest to observe the interrupt after the deadline. */
  graceMs: number;
}

// setTimeout fires immediately for delays above a signed 32-bit int
const MAX_TIMER_MS = 2_147_483_647;

function delay(ms: number): { promise: Promise<void>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, Math.min(ms, MAX_TIMER_MS));
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

export async function runWithDeadline(
  interpreter: GuestInterpreter,
  code: string,
  options: DeadlineOptions,
): Promise<BoundedOutcome> {
  const controller = new AbortController();

  let started: Promise<string | undefined>;
  try {
    started = interpreter.run(code, controller.signal);
  } catch (error) {
    started = Promise.reject(error);
  }

  const execution = started.then(
    (value): BoundedOutcome => ({ status: 'completed', value }),
    (error: unknown): BoundedOutcome => ({ status: 'failed', error }),
  );

  const deadline = delay(options.timeoutMs);
  const outcome = await Promise.race([
    execution,
    deadline.promise.then((): null => null),
  ]);
  // A completed run must not leave a timer behind to fire during a later request.
  deadline.cancel();

  if (outcome !== null) {
    return outcome;
  }

  controller.abort();
  const grace = delay(options.graceMs);
  const acknowledged = await Promise.race([
    execution.then(() => true),
    grace.promise.then(() => false),
  ]);
  grace.cancel();

  return { status: 'timed_out', acknowledged };
}
