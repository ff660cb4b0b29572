/**
 * Errors Module Exports
 */

export {
  LeanvoxError,
  InvalidRequestError,
  StreamingFormatError,
  AuthenticationError,
  InvalidCredentialError,
  MissingCredentialError,
  InsufficientBalanceError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ConnectionError,
  isLeanvoxError,
} from './leanvox-error';

export {
  classifyResponse,
  classifyTransportFailure,
  createApiError,
  isRetryableStatus,
  parseErrorBody,
} from './utils';

export { errorConfig } from './config';

export {
  LeanvoxErrorKind,
  type LeanvoxErrorOptions,
  type ErrorDetails,
  type ClassificationResult,
  type ClassifiedTransportFailure,
  type TransportFailureReason,
} from './types';
