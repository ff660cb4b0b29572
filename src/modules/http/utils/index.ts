/**
 * HTTP Utilities
 * Export barrel for retry policy, stream wrapper and response parsing
 */

export { decideRetry, getBackoffDelay, parseRetryAfter } from './retry-policy';
export { ByteStream } from './byte-stream';
export { parseResponse } from './parse-response';
