/**
 * Axios Transport
 * Default HttpTransport: one axios instance over keep-alive agents, owned by one client
 */

import http from 'node:http';
import https from 'node:https';
import { Readable } from 'node:stream';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { logger } from '@/shared/utils';
import type {
  FormPart,
  HttpHeaders,
  HttpTransport,
  TransportRequest,
  TransportResponse,
  TransportStreamResponse,
} from '../types';

export interface AxiosTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Replaces axios' Node adapter (used by tests) */
  adapter?: AxiosAdapter;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return new Uint8Array(0);
}

function normalizeHeaders(headers: object): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}

function buildFormData(parts: FormPart[]): FormData {
  const form = new FormData();
  for (const part of parts) {
    if ('content' in part) {
      const blob = new Blob([part.content], { type: part.contentType ?? 'application/octet-stream' });
      form.append(part.name, blob, part.filename);
    } else {
      form.append(part.name, part.value);
    }
  }
  return form;
}

export class AxiosTransport implements HttpTransport {
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly client: AxiosInstance;
  private closed = false;

  constructor(options: AxiosTransportOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      // Status handling belongs to the executor
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.client.request<unknown>({
      ...this.toAxiosConfig(request),
      responseType: 'arraybuffer',
    });

    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: toBytes(response.data),
    };
  }

  async stream(request: TransportRequest): Promise<TransportStreamResponse> {
    const response = await this.client.request<unknown>({
      ...this.toAxiosConfig(request),
      responseType: 'stream',
    });

    const body = response.data instanceof Readable ? response.data : Readable.from([toBytes(response.data)]);
    let released = false;

    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body,
      release: () => {
        if (released) return;
        released = true;
        body.destroy();
      },
    };
  }

  /**
   * Destroy pooled sockets. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    logger.debug('Transport closed');
  }

  private toAxiosConfig(request: TransportRequest): AxiosRequestConfig {
    if (this.closed) {
      throw new Error('Transport has been closed');
    }

    let data: unknown;
    if (request.formParts && request.formParts.length > 0) {
      data = buildFormData(request.formParts);
    } else if (request.json !== undefined) {
      data = request.json;
    }

    return {
      method: request.method,
      url: request.url,
      headers: request.headers,
      params: request.params,
      data,
      timeout: request.timeoutMs,
    };
  }
}
