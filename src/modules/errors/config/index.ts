export { errorConfig } from './error.config';
