/**
 * Resource Services Tests
 * Voices, files, generations and account facades over a fake transport
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError } from '@/modules/errors';
import { RequestExecutor, type ExecutorProvider } from '@/modules/http';
import {
  AccountService,
  FilesService,
  GenerationsService,
  VoicesService,
} from '@/modules/resources';
import { FakeTransport, json, recordingSleep } from '../../../helpers/fake-transport';

describe('Resource services', () => {
  let transport: FakeTransport;
  let provider: ExecutorProvider;

  beforeEach(() => {
    transport = new FakeTransport();
    const executor = new RequestExecutor({
      apiKey: 'lv_test_placeholder',
      transport,
      timeoutMs: 30000,
      streamTimeoutMs: 120000,
      streamIdleTimeoutMs: 1000,
      maxRetries: 2,
      sleep: recordingSleep().sleep,
    });
    provider = () => executor;
  });

  describe('VoicesService', () => {
    let voices: VoicesService;

    beforeEach(() => {
      voices = new VoicesService(provider);
    });

    it('should list voices grouped by tier with wire defaults', async () => {
      transport.reply(
        json(200, {
          standard_voices: [{ voice_id: 'std_1', name: 'Ava' }],
          pro_voices: [{ voice_id: 'pro_1', name: 'Max', model: 'pro', preview_url: 'https://cdn.example.com/p.mp3' }],
        })
      );

      const list = await voices.list({ model: 'pro' });

      expect(transport.requests[0].params).toEqual({ model: 'pro' });
      expect(list.standardVoices).toEqual([
        {
          voiceId: 'std_1',
          name: 'Ava',
          model: 'standard',
          language: 'en',
          status: 'active',
          description: '',
          previewUrl: '',
          unlockCostCents: 0,
        },
      ]);
      expect(list.proVoices[0].model).toBe('pro');
      expect(list.proVoices[0].previewUrl).toBe('https://cdn.example.com/p.mp3');
      expect(list.clonedVoices).toEqual([]);
    });

    it('should list voices without a model filter', async () => {
      transport.reply(json(200, {}));

      await voices.list();

      expect(transport.requests[0].params).toBeUndefined();
    });

    it('should list curated voices', async () => {
      transport.reply(json(200, { voices: [{ voice_id: 'c1', name: 'Curated' }] }));

      const curated = await voices.listCurated();

      expect(transport.requests[0].url).toBe('/v1/voices/curated');
      expect(curated.map((voice) => voice.voiceId)).toEqual(['c1']);
    });

    it('should clone from base64 audio as JSON', async () => {
      transport.reply(json(200, { voice_id: 'clone_1', name: 'Me', status: 'pending_unlock' }));

      const voice = await voices.clone('Me', 'UklGRg==', { description: 'My voice' });

      expect(transport.requests[0].json).toEqual({ name: 'Me', audio_base64: 'UklGRg==', description: 'My voice' });
      expect(voice.status).toBe('pending_unlock');
    });

    it('should clone from raw bytes as a multipart WAV upload', async () => {
      const audio = new Uint8Array([82, 73, 70, 70]);
      transport.reply(json(200, { voice_id: 'clone_2', name: 'Me' }));

      await voices.clone('Me', audio);

      expect(transport.requests[0].json).toBeUndefined();
      expect(transport.requests[0].formParts).toEqual([
        { name: 'name', value: 'Me' },
        { name: 'description', value: '' },
        { name: 'audio', filename: 'audio.wav', content: audio, contentType: 'audio/wav' },
      ]);
    });

    it('should unlock a pending clone when asked and report it active', async () => {
      transport.reply(
        json(200, { voice_id: 'clone 3', name: 'Me', status: 'pending_unlock' }),
        json(200, { unlocked: true })
      );

      const voice = await voices.clone('Me', 'UklGRg==', { autoUnlock: true });

      expect(transport.requests[1].method).toBe('POST');
      expect(transport.requests[1].url).toBe('/v1/voices/clone%203/unlock');
      expect(voice.status).toBe('active');
    });

    it('should not unlock a clone that is already active', async () => {
      transport.reply(json(200, { voice_id: 'clone_4', name: 'Me', status: 'active' }));

      await voices.clone('Me', 'UklGRg==', { autoUnlock: true });

      expect(transport.requests).toHaveLength(1);
    });

    it('should return the unlock response as a record', async () => {
      transport.reply(json(200, { voice_id: 'v1', cost_cents: 300 }));

      await expect(voices.unlock('v1')).resolves.toEqual({ voice_id: 'v1', cost_cents: 300 });
    });

    it('should design a voice and list designs', async () => {
      transport.reply(
        json(200, { id: 'd1', name: 'Pirate', status: 'ready', cost_cents: 100 }),
        json(200, { designs: [{ id: 'd1', name: 'Pirate' }] })
      );

      const design = await voices.design('Pirate', 'A gruff old sea captain', { language: 'en' });
      const designs = await voices.listDesigns();

      expect(transport.requests[0].json).toEqual({ name: 'Pirate', prompt: 'A gruff old sea captain', language: 'en' });
      expect(design).toEqual({ id: 'd1', name: 'Pirate', status: 'ready', costCents: 100 });
      expect(designs).toEqual([{ id: 'd1', name: 'Pirate', status: '', costCents: 0 }]);
    });

    it('should delete a voice', async () => {
      transport.reply({ status: 204 });

      await voices.delete('v1');

      expect(`${transport.requests[0].method} ${transport.requests[0].url}`).toBe('DELETE /v1/voices/v1');
    });

    it('should surface a missing voice as NotFoundError', async () => {
      transport.reply(json(404, { error: { message: 'Voice not found', code: 'not_found' } }));

      await expect(voices.delete('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('FilesService', () => {
    it('should upload the file and map the extracted text', async () => {
      const file = Buffer.from('Chapter one.');
      transport.reply(json(200, { text: 'Chapter one.', filename: 'book.txt', char_count: 12 }));

      const result = await new FilesService(provider).extractText(file, 'book.txt');

      expect(transport.requests[0].url).toBe('/v1/files/extract-text');
      expect(transport.requests[0].formParts).toEqual([{ name: 'file', filename: 'book.txt', content: file }]);
      expect(result).toEqual({ text: 'Chapter one.', filename: 'book.txt', charCount: 12, truncated: false });
    });

    it('should default the upload filename', async () => {
      transport.reply(json(200, {}));

      await new FilesService(provider).extractText(new Uint8Array([1]));

      expect(transport.requests[0].formParts).toEqual([
        { name: 'file', filename: 'upload', content: new Uint8Array([1]) },
      ]);
    });
  });

  describe('GenerationsService', () => {
    it('should page through generations with default limit and offset', async () => {
      transport.reply(
        json(200, {
          generations: [{ id: 'g1', audio_url: 'https://cdn.example.com/g1.mp3', characters: 10, created_at: '2026-01-02' }],
          total: 1,
        })
      );

      const page = await new GenerationsService(provider).list();

      expect(transport.requests[0].params).toEqual({ limit: 20, offset: 0 });
      expect(page.total).toBe(1);
      expect(page.generations[0]).toEqual({
        id: 'g1',
        audioUrl: 'https://cdn.example.com/g1.mp3',
        model: '',
        voice: '',
        characters: 10,
        costCents: 0,
        createdAt: '2026-01-02',
      });
    });

    it('should fetch and delete a generation', async () => {
      const generations = new GenerationsService(provider);
      transport.reply(json(200, { id: 'g2', audio_url: 'https://cdn.example.com/g2.mp3' }), { status: 204 });

      const generation = await generations.getAudio('g2');
      await generations.delete('g2');

      expect(generation.audioUrl).toBe('https://cdn.example.com/g2.mp3');
      expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        'GET /v1/generations/g2/audio',
        'DELETE /v1/generations/g2',
      ]);
    });
  });

  describe('AccountService', () => {
    it('should read the balance', async () => {
      transport.reply(json(200, { balance_cents: 1250, total_spent_cents: 300 }));

      await expect(new AccountService(provider).balance()).resolves.toEqual({
        balanceCents: 1250,
        totalSpentCents: 300,
      });
    });

    it('should query usage with defaults and an optional model', async () => {
      const account = new AccountService(provider);
      transport.reply(json(200, { entries: [{ day: '2026-01-01', characters: 100 }] }), json(200, {}));

      const usage = await account.usage();
      await account.usage({ days: 7, model: 'pro' });

      expect(transport.requests[0].params).toEqual({ days: 30, limit: 100 });
      expect(transport.requests[1].params).toEqual({ days: 7, limit: 100, model: 'pro' });
      expect(usage.entries).toEqual([{ day: '2026-01-01', characters: 100 }]);
    });

    it('should start a checkout session', async () => {
      transport.reply(json(200, { checkout_url: 'https://billing.example.com/s/1' }));

      const session = await new AccountService(provider).buyCredits(2000);

      expect(transport.requests[0].json).toEqual({ amount_cents: 2000 });
      expect(session).toEqual({ checkout_url: 'https://billing.example.com/s/1' });
    });
  });
});
