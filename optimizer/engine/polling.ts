/**
 * Bounded polling used for VM and service readiness
 */

import { setTimeout as delay } from 'timers/promises';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : {});
};

export interface PollOptions {
  timeoutS: number;
  intervalS: number;
  sleep: Sleeper;
  signal?: AbortSignal;
}

export function attemptsFor(timeoutS: number, intervalS: number): number {
  return Math.max(1, Math.ceil(timeoutS / intervalS));
}

/**
 * Calls `check` until it returns true or the attempts run out.
 * Rejects with the abort reason when `signal` fires.
 */
export async function pollUntil(options: PollOptions, check: () => Promise<boolean>): Promise<boolean> {
  const attempts = attemptsFor(options.timeoutS, options.intervalS);
  for (let attempt = 1; attempt <= attempts; attempt++) {
    options.signal?.throwIfAborted();
    if (await check()) {
      return true;
    }
    if (attempt < attempts) {
      await options.sleep(options.intervalS * 1000, options.signal);
    }
  }
  return false;
}
