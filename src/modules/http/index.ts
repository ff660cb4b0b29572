/**
 * HTTP Module Exports
 */

export {
  RequestExecutor,
  AxiosTransport,
  type RequestExecutorConfig,
  type ExecutorProvider,
  type AxiosTransportOptions,
} from './services';
export { ByteStream, decideRetry, getBackoffDelay, parseRetryAfter, parseResponse } from './utils';
export { retryConfig } from './config';
export type {
  HttpMethod,
  QueryParams,
  HttpHeaders,
  FormPart,
  TransportRequest,
  TransportResponse,
  TransportStreamResponse,
  HttpTransport,
  RequestOptions,
  StreamRequestOptions,
  AttemptOutcome,
  RetryDecision,
  RetryContext,
} from './types';
