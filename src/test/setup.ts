/**
 * Vitest Setup File
 * Global test configuration and setup
 */

import { afterEach, vi } from 'vitest';

// Tests never read a developer's real credentials or local .env
delete process.env.LEANVOX_API_KEY;
delete process.env.LEANVOX_BASE_URL;

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'test';
}

process.env.LEANVOX_LOG_LEVEL = 'error';

afterEach(() => {
  vi.restoreAllMocks();
});
