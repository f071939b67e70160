// src/core/scroll/wait.ts
import { setTimeout as delay } from 'node:timers/promises';

/**
 * Resolves `true` once `ms` elapsed, `false` when `signal` aborted first.
 */
export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const waitFor: WaitFn = async (ms, signal) => {
  if (signal?.aborted) {
    return false;
  }

  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
};
