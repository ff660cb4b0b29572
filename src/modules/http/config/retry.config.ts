/**
 * HTTP Retry Configuration
 */

export const retryConfig = {
  // Backoff delays by attempt index (milliseconds); the last entry repeats
  backoffScheduleMs: [1000, 2000, 4000], // 1s, 2s, 4s

  // Server hint consulted before the schedule
  retryAfterHeader: 'retry-after',
} as const;
