/**
 * Auth Module Exports
 */

export {
  resolveApiKey,
  ensureApiKey,
  validateApiKey,
  readConfigFileKey,
  type CredentialSources,
} from './utils';
export { authConfig, defaultConfigPath } from './config';
