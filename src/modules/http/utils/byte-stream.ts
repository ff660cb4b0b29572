/**
 * Byte Stream
 * Live audio bytes of a streamed response, released on every exit path
 */

import { ConnectionError, isLeanvoxError } from '@/modules/errors';
import { logger } from '@/shared/utils';
import type { TransportStreamResponse } from '../types';

export class ByteStream implements AsyncIterable<Buffer> {
  private released = false;
  private started = false;

  constructor(
    private readonly source: TransportStreamResponse,
    private readonly idleTimeoutMs: number
  ) {}

  get status(): number {
    return this.source.status;
  }

  get headers(): Readonly<Record<string, string>> {
    return this.source.headers;
  }

  /**
   * Iterate the chunks as they arrive. Single use: the bytes are not buffered.
   * Breaking out of the loop, an error, or the end of data all release the connection.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    if (this.started || this.released) {
      throw new ConnectionError('Stream has already been consumed or closed');
    }
    this.started = true;

    const iterator = this.source.body[Symbol.asyncIterator]();
    try {
      while (true) {
        const result = await this.nextWithIdleTimeout(iterator);
        if (result.done) {
          return;
        }
        yield Buffer.from(result.value);
      }
    } catch (error) {
      if (isLeanvoxError(error)) throw error;
      throw new ConnectionError(
        `Stream interrupted: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      this.close();
    }
  }

  /**
   * Read the remaining stream into one buffer
   */
  async toBuffer(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  /**
   * Release the connection without reading further. Idempotent.
   */
  close(): void {
    if (this.released) return;
    this.released = true;
    this.source.release();
    logger.debug('Stream released', { status: this.source.status });
  }

  private async nextWithIdleTimeout(
    iterator: AsyncIterator<Uint8Array>
  ): Promise<IteratorResult<Uint8Array>> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const idle = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ConnectionError(`Stream idle for more than ${this.idleTimeoutMs}ms`));
      }, this.idleTimeoutMs);
    });

    try {
      return await Promise.race([iterator.next(), idle]);
    } finally {
      clearTimeout(timer);
    }
  }
}
