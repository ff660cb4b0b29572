/**
 * Generations Service
 * Server-side generation history
 */

import { parseResponse, type ExecutorProvider } from '@/modules/http';
import { generationEndpoints, resourceDefaults } from '../config';
import {
  GenerationListSchema,
  GenerationSchema,
  type Generation,
  type GenerationList,
  type ListGenerationsOptions,
} from '../types';

export class GenerationsService {
  constructor(private readonly executor: ExecutorProvider) {}

  async list(options: ListGenerationsOptions = {}): Promise<GenerationList> {
    const data = await this.executor().execute('GET', generationEndpoints.list, {
      params: {
        limit: options.limit ?? resourceDefaults.generationsLimit,
        offset: options.offset ?? resourceDefaults.generationsOffset,
      },
    });
    return parseResponse(GenerationListSchema, data, generationEndpoints.list);
  }

  async getAudio(generationId: string): Promise<Generation> {
    const path = generationEndpoints.audio(generationId);
    const data = await this.executor().execute('GET', path);
    return parseResponse(GenerationSchema, data, path);
  }

  async delete(generationId: string): Promise<void> {
    await this.executor().execute('DELETE', generationEndpoints.generation(generationId));
  }
}
