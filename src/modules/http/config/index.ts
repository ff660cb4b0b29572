export { retryConfig } from './retry.config';
