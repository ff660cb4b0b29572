/**
 * Sleep Utility
 */

import { setTimeout as delay } from 'node:timers/promises';

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Resolve after `ms` milliseconds. Used for retry backoff and job polling.
 */
export const sleep: SleepFn = async (ms) => {
  await delay(ms);
};
