/**
 * Generation Types
 * Request parameters and wire schemas for speech generation and async jobs
 */

import { z } from 'zod';
import { wireNumber, wireOptionalString, wireString, wireArray } from '@/shared/utils';
import { JOB_STATUSES, TTS_MODELS } from '../config';

export type TTSModel = (typeof TTS_MODELS)[number];

/** Known formats; other strings are passed through to the API */
export type AudioFormat = 'mp3' | 'wav' | (string & {});

export interface GenerateParams {
  text: string;
  /** 'standard' (default) or 'pro' */
  model?: TTSModel | (string & {});
  voice?: string;
  language?: string;
  format?: AudioFormat;
  /** 0.5 to 2.0 */
  speed?: number;
  /** 0.0 to 1.0, pro model only */
  exaggeration?: number;
}

export interface GenerateAsyncParams extends GenerateParams {
  /** Called by the API when the job finishes */
  webhookUrl?: string;
}

export type StreamParams = GenerateParams;

export type ResolvedGenerateParams = Required<GenerateParams>;

/** One line of a dialogue, passed through to the API untouched */
export interface DialogueLine {
  text: string;
  voice?: string;
  [key: string]: unknown;
}

export interface DialogueOptions {
  model?: string;
  gapMs?: number;
}

export type JobStatus = (typeof JOB_STATUSES)[number];

export const JobSchema = z
  .object({
    id: wireString,
    status: z.enum(JOB_STATUSES).default('pending'),
    estimated_seconds: wireNumber,
    audio_url: wireString,
    error: wireString,
  })
  .transform((job) => ({
    id: job.id,
    status: job.status,
    estimatedSeconds: job.estimated_seconds,
    audioUrl: job.audio_url,
    error: job.error,
  }));

export type Job = z.output<typeof JobSchema>;

export const JobListSchema = z
  .object({ jobs: wireArray(JobSchema) })
  .transform((list) => list.jobs);

export const GenerateResponseSchema = z.object({
  audio_url: wireString,
  model: wireOptionalString,
  voice: wireOptionalString,
  characters: wireNumber,
  cost_cents: wireNumber,
  generated_voice_id: wireOptionalString,
  suggestion: wireOptionalString,
});

export type GenerateResponse = z.output<typeof GenerateResponseSchema>;
