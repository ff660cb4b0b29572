/**
 * Byte Stream Tests
 */

import { describe, it, expect } from 'vitest';
import { ConnectionError } from '@/modules/errors';
import { ByteStream, type TransportStreamResponse } from '@/modules/http';

interface Source {
  response: TransportStreamResponse;
  releases: () => number;
}

function createSource(
  chunks: string[],
  tail: { failWith?: Error; hang?: boolean } = {}
): Source {
  let releaseCount = 0;

  const body = async function* (): AsyncGenerator<Uint8Array> {
    for (const chunk of chunks) {
      yield Buffer.from(chunk, 'utf8');
    }
    if (tail.failWith) {
      throw tail.failWith;
    }
    if (tail.hang) {
      await new Promise<never>(() => undefined);
    }
  };

  return {
    response: {
      status: 200,
      headers: { 'content-type': 'audio/mpeg' },
      body: body(),
      release: () => {
        releaseCount++;
      },
    },
    releases: () => releaseCount,
  };
}

describe('ByteStream', () => {
  it('should yield every chunk in order and release at the end', async () => {
    const source = createSource(['ID3', 'frame1', 'frame2']);
    const stream = new ByteStream(source.response, 1000);

    const received: string[] = [];
    for await (const chunk of stream) {
      received.push(chunk.toString('utf8'));
    }

    expect(received).toEqual(['ID3', 'frame1', 'frame2']);
    expect(source.releases()).toBe(1);
  });

  it('should expose the response status and headers', () => {
    const stream = new ByteStream(createSource([]).response, 1000);

    expect(stream.status).toBe(200);
    expect(stream.headers).toEqual({ 'content-type': 'audio/mpeg' });
  });

  it('should release exactly once when the consumer breaks early', async () => {
    const source = createSource(['a', 'b', 'c']);
    const stream = new ByteStream(source.response, 1000);

    for await (const chunk of stream) {
      expect(chunk.toString('utf8')).toBe('a');
      break;
    }
    stream.close();

    expect(source.releases()).toBe(1);
  });

  it('should release a stream that is closed without being read', () => {
    const source = createSource(['a']);
    const stream = new ByteStream(source.response, 1000);

    stream.close();
    stream.close();

    expect(source.releases()).toBe(1);
  });

  it('should wrap a mid-stream failure in ConnectionError and release', async () => {
    const source = createSource(['a'], { failWith: new Error('socket hang up') });
    const stream = new ByteStream(source.response, 1000);

    const error = await stream.toBuffer().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError && error.message).toBe('Stream interrupted: socket hang up');
    expect(source.releases()).toBe(1);
  });

  it('should fail a wedged stream after the idle timeout', async () => {
    const source = createSource(['a'], { hang: true });
    const stream = new ByteStream(source.response, 20);

    const error = await stream.toBuffer().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError && error.message).toBe('Stream idle for more than 20ms');
    expect(source.releases()).toBe(1);
  });

  it('should refuse to be iterated twice', async () => {
    const source = createSource(['a']);
    const stream = new ByteStream(source.response, 1000);

    await stream.toBuffer();

    await expect(stream.toBuffer()).rejects.toThrow('Stream has already been consumed or closed');
    expect(source.releases()).toBe(1);
  });
});
