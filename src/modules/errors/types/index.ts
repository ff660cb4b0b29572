export {
  LeanvoxErrorKind,
  type LeanvoxErrorOptions,
  type ErrorDetails,
  type ClassificationResult,
  type TransportFailureReason,
  type ClassifiedTransportFailure,
} from './error.types';
