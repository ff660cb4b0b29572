/**
 * Error Utilities
 * Export barrel for classification helpers
 */

export {
  classifyResponse,
  classifyTransportFailure,
  createApiError,
  isRetryableStatus,
  parseErrorBody,
} from './error-classifier';
