/**
 * Client Configuration
 * Defaults applied to every Leanvox client unless overridden at construction
 */

export const sdkInfo = {
  name: 'leanvox-node',
  version: '0.1.0',
} as const;

export const USER_AGENT = `${sdkInfo.name}/${sdkInfo.version}`;

export const clientDefaults = {
  baseUrl: 'https://api.leanvox.com',

  // Buffered requests (milliseconds)
  timeoutMs: 30000, // 30s

  // Streaming requests: overall budget, and max silence between chunks
  streamTimeoutMs: 120000, // 2 min
  streamIdleTimeoutMs: 30000, // 30s

  // Retries after the first attempt
  maxRetries: 2,

  // Texts longer than this are routed through the async job API
  autoAsyncThreshold: 5000,

  // Delay between job status polls
  pollIntervalMs: 2000,
} as const;
