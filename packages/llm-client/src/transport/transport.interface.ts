export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  statusCode: number;
  body: Buffer;
}

export interface StreamingTransportResponse {
  statusCode: number;
  body: AsyncIterable<Buffer | string>;
}

/**
 * HTTP seam of the client. Implementations report connectivity problems as
 * NetworkError / TimeoutError and return every HTTP status as a response.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
  openStream(request: TransportRequest): Promise<StreamingTransportResponse>;
}
