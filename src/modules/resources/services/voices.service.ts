/**
 * Voices Service
 * Voice catalog, cloning and design
 */

import { parseResponse, type ExecutorProvider, type FormPart } from '@/modules/http';
import { logger, wireRecord } from '@/shared/utils';
import { resourceDefaults, voiceEndpoints } from '../config';
import {
  CuratedVoicesSchema,
  VoiceDesignListSchema,
  VoiceDesignSchema,
  VoiceListSchema,
  VoiceSchema,
  type CloneVoiceOptions,
  type DesignVoiceOptions,
  type Voice,
  type VoiceDesign,
  type VoiceList,
} from '../types';

export class VoicesService {
  constructor(private readonly executor: ExecutorProvider) {}

  async list(options: { model?: string } = {}): Promise<VoiceList> {
    const data = await this.executor().execute('GET', voiceEndpoints.list, {
      params: options.model ? { model: options.model } : undefined,
    });
    return parseResponse(VoiceListSchema, data, voiceEndpoints.list);
  }

  async listCurated(): Promise<Voice[]> {
    const data = await this.executor().execute('GET', voiceEndpoints.curated);
    return parseResponse(CuratedVoicesSchema, data, voiceEndpoints.curated);
  }

  /**
   * Clone a voice from a reference recording. A base64 string is sent as JSON;
   * raw bytes are uploaded as a multipart WAV file.
   */
  async clone(name: string, audio: string | Uint8Array, options: CloneVoiceOptions = {}): Promise<Voice> {
    const description = options.description ?? '';

    let data: unknown;
    if (typeof audio === 'string') {
      data = await this.executor().execute('POST', voiceEndpoints.clone, {
        json: { name, audio_base64: audio, description },
      });
    } else {
      const formParts: FormPart[] = [
        { name: 'name', value: name },
        { name: 'description', value: description },
        {
          name: 'audio',
          filename: resourceDefaults.cloneFilename,
          content: audio,
          contentType: resourceDefaults.cloneContentType,
        },
      ];
      data = await this.executor().execute('POST', voiceEndpoints.clone, { formParts });
    }

    const voice = parseResponse(VoiceSchema, data, voiceEndpoints.clone);

    if (options.autoUnlock && voice.status === 'pending_unlock') {
      logger.info('Unlocking cloned voice', { voiceId: voice.voiceId });
      await this.unlock(voice.voiceId);
      return { ...voice, status: 'active' };
    }

    return voice;
  }

  async unlock(voiceId: string): Promise<Record<string, unknown>> {
    const path = voiceEndpoints.unlock(voiceId);
    const data = await this.executor().execute('POST', path);
    return parseResponse(wireRecord, data, path);
  }

  /**
   * Create a voice from a text description
   */
  async design(name: string, prompt: string, options: DesignVoiceOptions = {}): Promise<VoiceDesign> {
    const body: Record<string, unknown> = { name, prompt };
    if (options.language) body.language = options.language;
    if (options.description) body.description = options.description;

    const data = await this.executor().execute('POST', voiceEndpoints.design, { json: body });
    return parseResponse(VoiceDesignSchema, data, voiceEndpoints.design);
  }

  async listDesigns(): Promise<VoiceDesign[]> {
    const data = await this.executor().execute('GET', voiceEndpoints.designs);
    return parseResponse(VoiceDesignListSchema, data, voiceEndpoints.designs);
  }

  async delete(voiceId: string): Promise<void> {
    await this.executor().execute('DELETE', voiceEndpoints.voice(voiceId));
  }
}
