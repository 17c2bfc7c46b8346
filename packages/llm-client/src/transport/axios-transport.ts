import http from 'http';
import https from 'https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { NetworkError, TimeoutError } from '../errors';
import type {
  StreamingTransportResponse,
  Transport,
  TransportRequest,
  TransportResponse,
} from './transport.interface';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface AxiosTransportOptions {
  /** Replaces the HTTP adapter, e.g. with an in-process one. */
  adapter?: AxiosAdapter;
}

export function toTransportError(error: unknown, timeoutMs: number): NetworkError {
  if (axios.isCancel(error)) {
    return new NetworkError('Request was cancelled', { cause: error });
  }
  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(timeoutMs, { cause: error });
    }
    return new NetworkError(`Network error: ${error.message}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Network error: ${message}`, { cause: error });
}

/**
 * Transport over a keep-alive axios instance. Every HTTP status resolves; only
 * failures without a response reject.
 */
export class AxiosTransport implements Transport {
  private readonly client: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.client = axios.create({
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.client.request<ArrayBuffer>({
        url: request.url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        timeout: request.timeoutMs,
        signal: request.signal,
        responseType: 'arraybuffer',
      });
      return { statusCode: response.status, body: Buffer.from(response.data) };
    } catch (error) {
      throw toTransportError(error, request.timeoutMs);
    }
  }

  async openStream(request: TransportRequest): Promise<StreamingTransportResponse> {
    try {
      const response = await this.client.request<Readable>({
        url: request.url,
        method: request.method,
        headers: { ...request.headers, Accept: 'text/event-stream' },
        data: request.body,
        timeout: request.timeoutMs,
        signal: request.signal,
        responseType: 'stream',
      });
      return { statusCode: response.status, body: response.data };
    } catch (error) {
      throw toTransportError(error, request.timeoutMs);
    }
  }
}
