/**
 * Error Classification Configuration
 */

export const errorConfig = {
  // Statuses worth another attempt (rate limiting and transient upstream failures)
  retryableStatusCodes: [429, 500, 502, 503, 504],

  // Fallbacks when a failed response carries no usable error object
  fallbackCode: 'unknown',
  fallbackMessage: (status: number): string => `API error ${status}`,

  // Transport error codes (Node / axios) that indicate a retryable network failure
  connectionErrorCodes: [
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'ERR_NETWORK',
  ],
  timeoutErrorCodes: ['ETIMEDOUT', 'ECONNABORTED', 'ERR_CANCELED_TIMEOUT', 'UND_ERR_CONNECT_TIMEOUT'],
} as const;
