/**
 * Credential Configuration
 */

import os from 'node:os';
import path from 'node:path';

export const authConfig = {
  // Every Leanvox key starts with one of these
  validPrefixes: ['lv_live_', 'lv_test_'],

  envVar: 'LEANVOX_API_KEY',

  // How much of a rejected key is echoed back in the error message
  keyPreviewLength: 10,

  errorCode: 'invalid_api_key',
  errorStatus: 401,
} as const;

/**
 * Per-user config file written by the Leanvox CLI (~/.lvox/config.toml)
 */
export function defaultConfigPath(): string {
  return path.join(os.homedir(), '.lvox', 'config.toml');
}
