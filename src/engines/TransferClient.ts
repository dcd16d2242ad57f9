/**
 * Cliente HTTP de streaming usado por el TransferWorker.
 *
 * El worker solo necesita: GET con cabeceras propias, código de estado, cabeceras de
 * respuesta (Content-Length) y el cuerpo como iterable asíncrono de bytes. Distinguir
 * 206 (rango aceptado) de 200 (rango ignorado) es responsabilidad del worker.
 *
 * AxiosTransferClient es la implementación por defecto; los tests inyectan un cliente
 * en proceso que sirve Readables.
 *
 * @module engines/TransferClient
 */

import axios, { type AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import config from '../config';

export interface TransferRequest {
  url: string;
  headers: Record<string, string>;
  signal: AbortSignal;
  timeoutMs: number;
}

export interface TransferResponse {
  statusCode: number;
  /** Nombres en minúsculas. */
  headers: Record<string, string | undefined>;
  body: AsyncIterable<Uint8Array>;
  /** Libera la conexión sin consumir el resto del cuerpo. */
  destroy(): void;
}

export interface TransferClient {
  open(request: TransferRequest): Promise<TransferResponse>;
}

export interface AxiosTransferClientOptions {
  maxRedirects?: number;
}

/** Normaliza cabeceras de respuesta a minúsculas y string. */
export function normalizeHeaders(raw: object): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
}

/** Content-Length como entero no negativo, o null si falta o no es válido. */
export function parseContentLength(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export class AxiosTransferClient implements TransferClient {
  private readonly http: AxiosInstance;
  private readonly maxRedirects: number;

  constructor(http: AxiosInstance = axios.create(), options: AxiosTransferClientOptions = {}) {
    this.http = http;
    this.maxRedirects = options.maxRedirects ?? config.network.maxRedirects;
  }

  async open(request: TransferRequest): Promise<TransferResponse> {
    const response = await this.http.request<Readable>({
      method: 'GET',
      url: request.url,
      // Content-Length debe describir los bytes que se escriben a disco
      headers: { 'Accept-Encoding': 'identity', ...request.headers },
      signal: request.signal,
      timeout: request.timeoutMs,
      responseType: 'stream',
      decompress: false,
      maxRedirects: this.maxRedirects,
      validateStatus: () => true,
    });

    const body = response.data;
    return {
      statusCode: response.status,
      headers: normalizeHeaders(response.headers),
      body,
      destroy: () => {
        if (!body.destroyed) body.destroy();
      },
    };
  }
}

export default AxiosTransferClient;
