// src/core/backoff/timeout-tracker.ts
import {
  RATE_LIMIT_BACKOFF_FACTOR,
  RATE_LIMIT_CONSECUTIVE_TIMEOUTS_THRESHOLD,
  RATE_LIMIT_INITIAL_COOLDOWN_MS,
  RATE_LIMIT_MAX_COOLDOWN_MS,
} from '../config/constants.js';

export interface TimeoutSignal {
  success?: boolean;
  timeoutOccurred?: boolean;
  /** Decay faster after a definite success */
  aggressive?: boolean;
}

/**
 * Next consecutive-timeout count. A timeout always increments, even when `success` is set.
 */
export function adjustTimeoutCounter(
  consecutiveTimeouts: number,
  { success = true, timeoutOccurred = false, aggressive = false }: TimeoutSignal = {}
): number {
  if (timeoutOccurred) {
    return consecutiveTimeouts + 1;
  }

  if (success && consecutiveTimeouts > RATE_LIMIT_CONSECUTIVE_TIMEOUTS_THRESHOLD && aggressive) {
    // keep part of a long failure history
    return Math.max(1, consecutiveTimeouts - 2);
  }
  if (success && consecutiveTimeouts > 0) {
    return consecutiveTimeouts - 1;
  }
  if (success) {
    return 0;
  }

  return consecutiveTimeouts;
}

/**
 * Seconds to wait before the next attempt: linear below the threshold, exponential and
 * capped at or above it.
 */
export function rateLimitBackoffSeconds(consecutiveTimeouts: number): number {
  if (consecutiveTimeouts < RATE_LIMIT_CONSECUTIVE_TIMEOUTS_THRESHOLD) {
    return 0.5 + (consecutiveTimeouts - 1) * 0.5;
  }

  const cooldownMs = Math.min(
    RATE_LIMIT_MAX_COOLDOWN_MS,
    RATE_LIMIT_INITIAL_COOLDOWN_MS *
      RATE_LIMIT_BACKOFF_FACTOR ** (consecutiveTimeouts - RATE_LIMIT_CONSECUTIVE_TIMEOUTS_THRESHOLD)
  );
  return cooldownMs / 1000;
}

export class TimeoutTracker {
  private consecutiveTimeouts = 0;

  get count(): number {
    return this.consecutiveTimeouts;
  }

  get isRateLimited(): boolean {
    return this.consecutiveTimeouts >= RATE_LIMIT_CONSECUTIVE_TIMEOUTS_THRESHOLD;
  }

  record(signal: TimeoutSignal): number {
    this.consecutiveTimeouts = adjustTimeoutCounter(this.consecutiveTimeouts, signal);
    return this.consecutiveTimeouts;
  }

  backoffSeconds(): number {
    return rateLimitBackoffSeconds(this.consecutiveTimeouts);
  }

  reset(): void {
    this.consecutiveTimeouts = 0;
  }
}
