/**
 * Agent Gateway - Rate Limiter Algorithms
 * Barrel export for the in-memory strategy implementations
 */

export {
  TokenBucketLimiter,
  createTokenBucketLimiter,
  type BucketState,
  type TokenBucketOptions,
} from './token-bucket.js';

export {
  SlidingWindowLimiter,
  createSlidingWindowLimiter,
  defaultLimitField,
  type SlidingWindowOptions,
  type WindowLimitField,
} from './sliding-window.js';

export {
  FixedWindowLimiter,
  createFixedWindowLimiter,
  type FixedWindowOptions,
  type WindowState,
} from './fixed-window.js';
