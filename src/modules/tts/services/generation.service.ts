/**
 * Generation Service
 * Validates generation requests and routes them: synchronous, streamed, or async job
 */

import { InvalidRequestError, StreamingFormatError } from '@/modules/errors';
import { parseResponse, type ByteStream, type ExecutorProvider } from '@/modules/http';
import { logger, type SleepFn } from '@/shared/utils';
import { TERMINAL_JOB_STATUSES, TTS_CONSTANTS, ttsDefaults, ttsEndpoints } from '../config';
import { GenerateResult, type GenerateResultData } from '../models';
import {
  GenerateResponseSchema,
  JobListSchema,
  JobSchema,
  type DialogueLine,
  type DialogueOptions,
  type GenerateAsyncParams,
  type GenerateParams,
  type Job,
  type JobStatus,
  type ResolvedGenerateParams,
  type StreamParams,
} from '../types';
import {
  buildGenerateBody,
  countCharacters,
  resolveGenerateParams,
  validateGenerateParams,
} from '../utils';

export interface GenerationServiceConfig {
  /** Texts longer than this many characters go through the async job API */
  autoAsyncThreshold: number;
  pollIntervalMs: number;
  sleep: SleepFn;
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.some((terminal) => terminal === status);
}

/**
 * GenerationService - speech generation on top of the request executor
 */
export class GenerationService {
  constructor(
    private readonly executor: ExecutorProvider,
    private readonly config: GenerationServiceConfig
  ) {}

  /**
   * Generate speech. Texts above the auto-async threshold are submitted as a
   * job and polled until it completes or fails.
   */
  async generate(params: GenerateParams): Promise<GenerateResult> {
    const resolved = resolveGenerateParams(params);
    validateGenerateParams(resolved);

    const characters = countCharacters(resolved.text);
    if (characters > this.config.autoAsyncThreshold) {
      logger.info('Text exceeds auto-async threshold, submitting job', {
        characters,
        threshold: this.config.autoAsyncThreshold,
      });
      return this.generateViaJob(resolved);
    }

    const data = await this.executor().execute('POST', ttsEndpoints.generate, {
      json: buildGenerateBody(resolved),
    });
    const response = parseResponse(GenerateResponseSchema, data, ttsEndpoints.generate);

    return this.toResult({
      audioUrl: response.audio_url,
      model: response.model ?? resolved.model,
      voice: response.voice ?? resolved.voice,
      characters: response.characters,
      costCents: response.cost_cents,
      generatedVoiceId: response.generated_voice_id,
      suggestion: response.suggestion,
    });
  }

  /**
   * Stream MP3 audio as it is synthesized
   */
  async stream(params: StreamParams): Promise<ByteStream> {
    const format = params.format ?? TTS_CONSTANTS.STREAM_FORMAT;
    if (format.toLowerCase() !== TTS_CONSTANTS.STREAM_FORMAT) {
      throw new StreamingFormatError(
        `Streaming only supports MP3 format. Got format='${format}'. Use generate() for other formats.`,
        { code: 'streaming_format_error', statusCode: 400 }
      );
    }

    const resolved = resolveGenerateParams({ ...params, format: TTS_CONSTANTS.STREAM_FORMAT });
    validateGenerateParams(resolved);

    return this.executor().openStream('POST', ttsEndpoints.stream, {
      json: buildGenerateBody(resolved),
    });
  }

  /**
   * Submit an async generation job. Returns the job as accepted by the API.
   */
  async generateAsync(params: GenerateAsyncParams): Promise<Job> {
    const { webhookUrl, ...generateParams } = params;
    const resolved = resolveGenerateParams(generateParams);
    validateGenerateParams(resolved);
    return this.submitJob(resolved, webhookUrl);
  }

  async getJob(jobId: string): Promise<Job> {
    const data = await this.executor().execute('GET', ttsEndpoints.job(jobId));
    return parseResponse(JobSchema, data, ttsEndpoints.job(jobId));
  }

  async listJobs(): Promise<Job[]> {
    const data = await this.executor().execute('GET', ttsEndpoints.jobs);
    return parseResponse(JobListSchema, data, ttsEndpoints.jobs);
  }

  /**
   * Poll a job until it is completed or failed
   */
  async waitForJob(job: Job | string): Promise<Job> {
    let current = typeof job === 'string' ? await this.getJob(job) : job;

    while (!isTerminalJobStatus(current.status)) {
      await this.config.sleep(this.config.pollIntervalMs);
      current = await this.getJob(current.id);
      logger.debug('Polled job', { jobId: current.id, status: current.status });
    }

    return current;
  }

  /**
   * Multi-speaker dialogue. Lines are sent as given.
   */
  async dialogue(lines: DialogueLine[], options: DialogueOptions = {}): Promise<GenerateResult> {
    if (lines.length < TTS_CONSTANTS.MIN_DIALOGUE_LINES) {
      throw new InvalidRequestError('Dialogue requires at least 2 lines', {
        code: 'invalid_request',
        statusCode: 400,
      });
    }

    const model = options.model ?? ttsDefaults.dialogueModel;
    const data = await this.executor().execute('POST', ttsEndpoints.dialogue, {
      json: { model, lines, gap_ms: options.gapMs ?? ttsDefaults.dialogueGapMs },
    });
    const response = parseResponse(GenerateResponseSchema, data, ttsEndpoints.dialogue);

    return this.toResult({
      audioUrl: response.audio_url,
      model: response.model ?? model,
      voice: TTS_CONSTANTS.DIALOGUE_VOICE_LABEL,
      characters: response.characters,
      costCents: response.cost_cents,
    });
  }

  private async submitJob(params: ResolvedGenerateParams, webhookUrl?: string): Promise<Job> {
    const body = buildGenerateBody(params);
    if (webhookUrl) {
      body.webhook_url = webhookUrl;
    }

    const data = await this.executor().execute('POST', ttsEndpoints.generateAsync, { json: body });
    const job = parseResponse(JobSchema, data, ttsEndpoints.generateAsync);
    logger.debug('Submitted async job', { jobId: job.id, status: job.status });
    return job;
  }

  /**
   * Auto-promoted path. The job API does not echo usage back, so characters
   * and cost are reported as 0.
   */
  private async generateViaJob(params: ResolvedGenerateParams): Promise<GenerateResult> {
    const submitted = await this.submitJob(params);
    const job = await this.waitForJob(submitted);

    if (job.status === 'failed') {
      throw new InvalidRequestError(job.error || 'Async generation failed', {
        code: 'job_failed',
        statusCode: 400,
      });
    }

    return this.toResult({
      audioUrl: job.audioUrl,
      model: params.model,
      voice: params.voice,
      characters: 0,
      costCents: 0,
    });
  }

  private toResult(data: GenerateResultData): GenerateResult {
    return new GenerateResult(data, (url) => this.executor().fetchBytes(url));
  }
}
