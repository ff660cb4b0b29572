/**
 * TTS Module Exports
 */

export {
  GenerationService,
  isTerminalJobStatus,
  type GenerationServiceConfig,
} from './services';
export { GenerateResult, type GenerateResultData, type AudioDownloader } from './models';
export {
  countCharacters,
  resolveGenerateParams,
  validateGenerateParams,
  buildGenerateBody,
} from './utils';
export { TTS_CONSTANTS, TTS_MODELS, JOB_STATUSES, ttsDefaults, ttsEndpoints } from './config';
export type {
  TTSModel,
  AudioFormat,
  GenerateParams,
  GenerateAsyncParams,
  StreamParams,
  DialogueLine,
  DialogueOptions,
  Job,
  JobStatus,
} from './types';
