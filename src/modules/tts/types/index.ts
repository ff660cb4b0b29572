export {
  JobSchema,
  JobListSchema,
  GenerateResponseSchema,
  type TTSModel,
  type AudioFormat,
  type GenerateParams,
  type GenerateAsyncParams,
  type StreamParams,
  type ResolvedGenerateParams,
  type DialogueLine,
  type DialogueOptions,
  type JobStatus,
  type Job,
  type GenerateResponse,
} from './generation.types';
