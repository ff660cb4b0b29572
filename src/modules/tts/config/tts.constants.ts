/**
 * TTS Constants
 */

export const TTS_MODELS = ['standard', 'pro'] as const;

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export const TERMINAL_JOB_STATUSES = ['completed', 'failed'] as const;

export const TTS_CONSTANTS = {
  // Text limits
  MAX_TEXT_LENGTH: 10000, // characters (code points), hard API limit

  // Parameter ranges (inclusive)
  MIN_SPEED: 0.5,
  MAX_SPEED: 2.0,
  MIN_EXAGGERATION: 0.0,
  MAX_EXAGGERATION: 1.0,

  // Streaming is MP3 only
  STREAM_FORMAT: 'mp3',

  // Dialogue
  MIN_DIALOGUE_LINES: 2,
  DIALOGUE_VOICE_LABEL: 'dialogue',
} as const;

export const ttsDefaults = {
  model: 'standard',
  voice: '',
  language: 'en',
  format: 'mp3',
  speed: 1.0,
  exaggeration: 0.5, // the only value accepted on the standard model
  dialogueModel: 'pro',
  dialogueGapMs: 500,
} as const;

export const ttsEndpoints = {
  generate: '/v1/tts/generate',
  stream: '/v1/tts/stream',
  generateAsync: '/v1/tts/generate-async',
  dialogue: '/v1/tts/dialogue',
  jobs: '/v1/jobs',
  job: (id: string): string => `/v1/jobs/${encodeURIComponent(id)}`,
} as const;
