/**
 * Leanvox SDK
 * Public exports
 */

export { Leanvox, type LeanvoxOptions, type ClientConfig } from './leanvox.client';

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
  LeanvoxErrorKind,
  isLeanvoxError,
  type LeanvoxErrorOptions,
} from './modules/errors';

export type { CredentialSources } from './modules/auth';

export {
  ByteStream,
  type HttpTransport,
  type HttpMethod,
  type HttpHeaders,
  type FormPart,
  type TransportRequest,
  type TransportResponse,
  type TransportStreamResponse,
} from './modules/http';

export {
  GenerateResult,
  TTS_CONSTANTS,
  type TTSModel,
  type AudioFormat,
  type GenerateParams,
  type GenerateAsyncParams,
  type StreamParams,
  type DialogueLine,
  type DialogueOptions,
  type Job,
  type JobStatus,
} from './modules/tts';

export type {
  Voice,
  VoiceList,
  VoiceDesign,
  CloneVoiceOptions,
  DesignVoiceOptions,
  FileExtractResult,
  Generation,
  GenerationList,
  ListGenerationsOptions,
  AccountBalance,
  AccountUsage,
  UsageOptions,
  CheckoutSession,
} from './modules/resources';

export { LogLevel, logger } from './shared/utils';
export { sdkInfo } from './shared/config';
