/**
 * Cancellable sleep used between policy attempts.
 */

import { setTimeout as delay } from 'node:timers/promises';

/** Sleep for `seconds`; rejects with an AbortError if `signal` aborts first. */
export type SleepFn = (seconds: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = async (seconds, signal) => {
  await delay(Math.max(0, seconds * 1000), undefined, { signal });
};
