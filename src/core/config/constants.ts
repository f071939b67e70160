// src/core/config/constants.ts
export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const INITIAL_LOAD_TIMEOUT = 10000;
export const DEFAULT_MAX_SCROLLS = 50;
export const DEFAULT_MAX_STALL_CYCLES = 3;
export const DEFAULT_SCROLL_DISTANCE = 0.5; // fraction of the viewport height

// Scroll farther while every item in view was already seen
export const ADAPTIVE_SCROLL_BASE = 1.5;
export const ADAPTIVE_SCROLL_STEP = 0.5;
export const ADAPTIVE_SCROLL_MAX = 5;

// Consecutive timeouts before backoff switches from linear to exponential
export const RATE_LIMIT_CONSECUTIVE_TIMEOUTS_THRESHOLD = 2;
export const RATE_LIMIT_INITIAL_COOLDOWN_MS = 5000;
export const RATE_LIMIT_MAX_COOLDOWN_MS = 30000;
export const RATE_LIMIT_BACKOFF_FACTOR = 2;

export const DEFAULT_IDENTITY_FIELD = 'url';
export const DEFAULT_SESSION_DIR = '.feedharvest/session';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
