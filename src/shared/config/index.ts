/**
 * Shared Configuration
 * Centralized exports for all configuration
 */

import dotenv from 'dotenv';

// Load environment variables from a local .env file, if any
dotenv.config();

/**
 * Environment variables
 *
 * Read lazily so that a key exported after import (or set by a test) is seen
 * on the next lookup.
 */
export const env = {
  nodeEnv: (): string => process.env.NODE_ENV || 'development',

  apiKey: (source: NodeJS.ProcessEnv = process.env): string | undefined =>
    source.LEANVOX_API_KEY,

  baseUrl: (): string | undefined => process.env.LEANVOX_BASE_URL || undefined,

  logLevel: (): string | undefined => process.env.LEANVOX_LOG_LEVEL || process.env.LOG_LEVEL,
} as const;

// Export client configuration
export * from './client';
