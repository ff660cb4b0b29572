export { authConfig, defaultConfigPath } from './auth.config';
