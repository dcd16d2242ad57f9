/**
 * Cliente HTTP en proceso para los tests: sirve Readables construidos en memoria y
 * registra cada petición recibida.
 */
import { Readable } from 'stream';
import type {
  TransferClient,
  TransferRequest,
  TransferResponse,
} from '../../src/engines/TransferClient';

export interface FakeReply {
  status?: number;
  /** Bloques del cuerpo, en orden. */
  parts?: Uint8Array[];
  /** Content-Length anunciado; null lo omite. Por defecto la suma de `parts`. */
  contentLength?: number | null;
  /** Espera antes de cada bloque (ms). */
  delayMs?: number;
  /** Error del stream tras servir todos los bloques. */
  failAfterParts?: Error;
  /** open() rechaza con este error. */
  openError?: Error;
}

export type FakeHandler = (request: TransferRequest, attempt: number) => FakeReply;

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Bytes deterministas: byte i = i % 251. */
export function makePayload(size: number): Buffer {
  const payload = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    payload[i] = i % 251;
  }
  return payload;
}

export function splitParts(data: Uint8Array, partSize: number): Uint8Array[] {
  const parts: Uint8Array[] = [];
  for (let offset = 0; offset < data.length; offset += partSize) {
    parts.push(data.subarray(offset, offset + partSize));
  }
  return parts;
}

async function* produce(reply: FakeReply): AsyncGenerator<Buffer> {
  for (const part of reply.parts ?? []) {
    if (reply.delayMs) await delay(reply.delayMs);
    yield Buffer.from(part);
  }
  if (reply.failAfterParts) {
    // Deja que el consumidor lea lo ya servido antes de romper el stream
    await delay(20);
    throw reply.failAfterParts;
  }
}

export class FakeTransferClient implements TransferClient {
  readonly requests: TransferRequest[] = [];
  handler: FakeHandler;

  constructor(handler: FakeHandler) {
    this.handler = handler;
  }

  async open(request: TransferRequest): Promise<TransferResponse> {
    this.requests.push({ ...request, headers: { ...request.headers } });
    const reply = this.handler(request, this.requests.length);
    if (reply.openError) throw reply.openError;

    const parts = reply.parts ?? [];
    const announced =
      reply.contentLength === undefined
        ? parts.reduce((sum, part) => sum + part.length, 0)
        : reply.contentLength;
    const headers: Record<string, string | undefined> = {};
    if (announced !== null) {
      headers['content-length'] = String(announced);
    }

    const body = Readable.from(produce(reply));
    return {
      statusCode: reply.status ?? 200,
      headers,
      body,
      destroy: () => {
        if (!body.destroyed) body.destroy();
      },
    };
  }
}
