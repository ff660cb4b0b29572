export {
  resolveApiKey,
  ensureApiKey,
  validateApiKey,
  readConfigFileKey,
  type CredentialSources,
} from './credential-resolver';
