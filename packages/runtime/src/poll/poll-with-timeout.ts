/**
 * Bounded polling of a changing value
 *
 * The budget is checked after each miss: it is reduced by one interval and
 * polling continues while it stays >= 0. The probe therefore runs once more
 * when the nominal deadline is reached (timeout 10, interval 5 gives three
 * evaluations: budget 10 -> 5 -> 0 -> -5).
 */

import type { Sleep } from '@pdu-cycle/core';
import { err, ok, type Result } from '../utils/result.js';

export type PollOptions<T, E> = {
  /** Reads the current value; an Err aborts polling */
  probe: () => Promise<Result<T, E>>;
  target: T;
  /** Seconds slept between evaluations */
  interval: number;
  /** Seconds of budget */
  timeout: number;
  sleep: Sleep;
  equals?: (value: T, target: T) => boolean;
  /** Called with every value that did not match */
  onMiss?: (value: T, remaining: number) => void;
};

export type PollStats = {
  evaluations: number;
  sleeps: number;
};

export type PollFailure<E> =
  | { reason: 'timeout'; stats: PollStats }
  | { reason: 'probe'; error: E; stats: PollStats };

export async function pollWithTimeout<T, E>(
  options: PollOptions<T, E>
): Promise<Result<PollStats, PollFailure<E>>> {
  const { probe, target, interval, timeout, sleep } = options;
  if (!(interval > 0)) {
    throw new RangeError(`Poll interval must be positive, got ${interval}`);
  }
  const equals = options.equals ?? Object.is;
  const stats: PollStats = { evaluations: 0, sleeps: 0 };
  let remaining = timeout;

  for (;;) {
    const read = await probe();
    stats.evaluations++;

    if (!read.ok) {
      return err({ reason: 'probe', error: read.error, stats });
    }
    if (equals(read.value, target)) {
      return ok(stats);
    }

    remaining -= interval;
    options.onMiss?.(read.value, remaining);
    if (remaining < 0) {
      return err({ reason: 'timeout', stats });
    }

    await sleep(interval);
    stats.sleeps++;
  }
}
