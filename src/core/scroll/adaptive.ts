// src/core/scroll/adaptive.ts
import { ADAPTIVE_SCROLL_BASE, ADAPTIVE_SCROLL_MAX, ADAPTIVE_SCROLL_STEP } from '../config/constants.js';

/**
 * Scroll distance multiplier after `consecutiveAllSeen` cycles in which every record was
 * already seen. 1 while new records keep appearing, then 2, 2.5, 3 ... up to 5.
 */
export function adaptiveScrollMultiplier(consecutiveAllSeen: number): number {
  if (consecutiveAllSeen <= 0) {
    return 1;
  }
  return Math.min(ADAPTIVE_SCROLL_MAX, ADAPTIVE_SCROLL_BASE + consecutiveAllSeen * ADAPTIVE_SCROLL_STEP);
}
