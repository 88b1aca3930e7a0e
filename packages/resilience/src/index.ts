export { withTimeout, TimeoutError, isTimeoutError } from './timeout.js';
export { mapWithConcurrency } from './pool.js';
