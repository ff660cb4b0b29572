/**
 * Credential Resolver
 * API key lookup chain: explicit argument > environment > config file
 */

import fs from 'node:fs';
import * as Toml from '@iarna/toml';
import { env } from '@/shared/config';
import { logger } from '@/shared/utils';
import { InvalidCredentialError, MissingCredentialError } from '@/modules/errors';
import { authConfig, defaultConfigPath } from '../config';

export interface CredentialSources {
  /** Environment to read LEANVOX_API_KEY from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config file location (default: ~/.lvox/config.toml) */
  configPath?: string;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Read `api_key` (or `auth.api_key`) from the TOML config file.
 * The file is best-effort: a missing, unreadable or malformed file counts as absent.
 */
export function readConfigFileKey(configPath: string = defaultConfigPath()): string | undefined {
  if (!fs.existsSync(configPath)) {
    return undefined;
  }

  try {
    const data = Toml.parse(fs.readFileSync(configPath, 'utf8'));
    const auth = data.auth;
    const nested =
      typeof auth === 'object' && auth !== null && !Array.isArray(auth) && !(auth instanceof Date)
        ? auth.api_key
        : undefined;
    return nonEmptyString(data.api_key) ?? nonEmptyString(nested);
  } catch (error) {
    logger.debug('Ignoring unreadable config file', {
      configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

/**
 * Throw InvalidCredentialError unless the key is non-empty with a known prefix
 */
export function validateApiKey(key: string): void {
  if (!key) {
    throw new InvalidCredentialError('API key cannot be empty', {
      code: authConfig.errorCode,
      statusCode: authConfig.errorStatus,
    });
  }

  if (!authConfig.validPrefixes.some((prefix) => key.startsWith(prefix))) {
    throw new InvalidCredentialError(
      `API key must start with ${authConfig.validPrefixes.join(' or ')}, got '${key.slice(0, authConfig.keyPreviewLength)}...'`,
      { code: authConfig.errorCode, statusCode: authConfig.errorStatus }
    );
  }
}

/**
 * Resolve the API key. Returns undefined when no source has one; the missing
 * key is only reported when a request is actually made (see ensureApiKey).
 */
export function resolveApiKey(
  explicit?: string,
  sources: CredentialSources = {}
): string | undefined {
  // 1. Constructor argument, even when empty
  if (explicit !== undefined) {
    validateApiKey(explicit);
    return explicit;
  }

  // 2. Environment variable
  const envKey = env.apiKey(sources.env ?? process.env);
  if (envKey) {
    validateApiKey(envKey);
    return envKey;
  }

  // 3. Config file
  const fileKey = readConfigFileKey(sources.configPath);
  if (fileKey) {
    validateApiKey(fileKey);
    return fileKey;
  }

  return undefined;
}

/**
 * Second phase of resolution, called at first network use
 */
export function ensureApiKey(key: string | undefined, configPath: string = defaultConfigPath()): string {
  if (key === undefined) {
    throw new MissingCredentialError(
      `No API key provided. Pass apiKey to the constructor, set ${authConfig.envVar} env var, or create ${configPath}`,
      { code: authConfig.errorCode, statusCode: authConfig.errorStatus }
    );
  }
  return key;
}
