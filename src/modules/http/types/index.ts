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
} from './http.types';
