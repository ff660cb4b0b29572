/**
 * Generate Result Tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { InvalidRequestError } from '@/modules/errors';
import { GenerateResult } from '@/modules/tts';

const data = {
  audioUrl: 'https://cdn.example.com/audio/gen_1.mp3',
  model: 'standard',
  voice: 'narrator',
  characters: 5,
  costCents: 1,
};

describe('GenerateResult', () => {
  it('should download the audio URL through the downloader', async () => {
    const downloader = vi.fn(async () => Buffer.from('ID3audio'));
    const result = new GenerateResult(data, downloader);

    const audio = await result.download();

    expect(audio.toString('utf8')).toBe('ID3audio');
    expect(downloader).toHaveBeenCalledWith('https://cdn.example.com/audio/gen_1.mp3');
  });

  it('should refuse to download without an audio URL', async () => {
    const downloader = vi.fn(async () => Buffer.alloc(0));
    const result = new GenerateResult({ ...data, audioUrl: '' }, downloader);

    await expect(result.download()).rejects.toBeInstanceOf(InvalidRequestError);
    expect(downloader).not.toHaveBeenCalled();
  });

  it('should write the audio to disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'leanvox-result-'));
    const filePath = path.join(dir, 'out.mp3');
    const result = new GenerateResult(data, async () => Buffer.from([1, 2, 3]));

    try {
      await result.save(filePath);
      expect([...fs.readFileSync(filePath)]).toEqual([1, 2, 3]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should carry the optional voice fields when present', () => {
    const plain = new GenerateResult(data, async () => Buffer.alloc(0));
    const withVoice = new GenerateResult({ ...data, generatedVoiceId: 'gv_1', suggestion: 'Try pro' }, async () =>
      Buffer.alloc(0)
    );

    expect(plain.generatedVoiceId).toBeUndefined();
    expect(withVoice.generatedVoiceId).toBe('gv_1');
    expect(withVoice.suggestion).toBe('Try pro');
  });
});
