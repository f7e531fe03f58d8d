/**
 * Agent Gateway - Retry Module
 */

export {
  RetryPolicy,
  createRetryPolicy,
  type RetryPolicyOptions,
  type RetryAttemptInfo,
  type ExecuteOptions,
} from './policy.js';

export { isRetryableError, RETRYABLE_NETWORK_CODES } from './classify.js';
