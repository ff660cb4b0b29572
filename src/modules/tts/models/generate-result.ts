/**
 * Generate Result
 * Outcome of generate() and dialogue(), with helpers to fetch the audio
 */

import { writeFile } from 'node:fs/promises';
import { InvalidRequestError } from '@/modules/errors';

export interface GenerateResultData {
  audioUrl: string;
  model: string;
  voice: string;
  characters: number;
  costCents: number;
  generatedVoiceId?: string;
  suggestion?: string;
}

export type AudioDownloader = (url: string) => Promise<Buffer>;

export class GenerateResult implements GenerateResultData {
  readonly audioUrl: string;
  readonly model: string;
  readonly voice: string;
  readonly characters: number;
  readonly costCents: number;
  readonly generatedVoiceId?: string;
  readonly suggestion?: string;

  constructor(
    data: GenerateResultData,
    private readonly downloader: AudioDownloader
  ) {
    this.audioUrl = data.audioUrl;
    this.model = data.model;
    this.voice = data.voice;
    this.characters = data.characters;
    this.costCents = data.costCents;
    this.generatedVoiceId = data.generatedVoiceId;
    this.suggestion = data.suggestion;
  }

  /**
   * Download the audio bytes from the CDN URL
   */
  async download(): Promise<Buffer> {
    if (!this.audioUrl) {
      throw new InvalidRequestError('Generation has no audio URL to download', {
        code: 'missing_audio_url',
      });
    }
    return this.downloader(this.audioUrl);
  }

  /**
   * Download the audio and write it to `filePath`
   */
  async save(filePath: string): Promise<void> {
    const audio = await this.download();
    await writeFile(filePath, audio);
  }
}
