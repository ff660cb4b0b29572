export {
  TTS_CONSTANTS,
  TTS_MODELS,
  JOB_STATUSES,
  TERMINAL_JOB_STATUSES,
  ttsDefaults,
  ttsEndpoints,
} from './tts.constants';
