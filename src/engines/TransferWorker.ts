/**
 * Bucle de transferencia de una tarea: un stream HTTP hacia un archivo de destino.
 *
 * run() calcula el offset de reanudación a partir del archivo parcial, pide
 * `Range: bytes=<offset>-` si procede y valida la respuesta: 206 continúa en modo append,
 * 200 tras pedir rango trunca y empieza de cero, 416 borra el parcial y repite desde cero.
 * El cuerpo se procesa en chunks de `chunkSize`; antes de cada uno se comprueba la
 * cancelación y se espera en la PauseGate si la tarea está en pausa. Cada
 * `progressIntervalMs` se alimenta el SpeedEstimator y se notifica progreso.
 *
 * El worker es el único escritor de task.metrics y del archivo de destino. Nunca lanza:
 * devuelve un WorkerOutcome que el TaskRegistry traduce a estado y eventos. Si la tarea
 * está en pausa al terminar, espera a que la reanuden o la cancelen antes de devolverlo.
 *
 * @module engines/TransferWorker
 */

import { promises as fs } from 'fs';
import config from '../config';
import { logger } from '../utils/logger';
import {
  ensureParentDirectory,
  errnoCode,
  getFileSize,
  removeFileIfExists,
} from '../utils/fileHelpers';
import { TransferError, errorMessage } from '../errors';
import { ERRORS } from '../constants/errors';
import { SpeedEstimator } from './SpeedEstimator';
import { parseContentLength, type TransferClient, type TransferResponse } from './TransferClient';
import { computeProgressPercent } from './types';
import type { Task } from './Task';

const log = logger.child('TransferWorker');

/** Códigos errno que indican un fallo del disco local, no de la red. */
const FILE_ERROR_CODES = new Set(['ENOSPC', 'EACCES', 'EPERM', 'EROFS', 'EISDIR', 'EMFILE', 'EBUSY']);

export type WorkerOutcome =
  | { type: 'completed' }
  | { type: 'cancelled' }
  | { type: 'failed'; error: TransferError };

export interface TransferWorkerOptions {
  client: TransferClient;
  chunkSize?: number;
  progressIntervalMs?: number;
  speedWindowMs?: number;
  requestTimeoutMs?: number;
  /** Llamado tras actualizar las métricas de progreso. */
  onProgress?: (_task: Task) => void;
}

interface OpenedTransfer {
  response: TransferResponse;
  /** Bytes ya presentes en disco que el servidor no volverá a enviar. */
  offset: number;
}

export class TransferWorker {
  private readonly task: Task;
  private readonly client: TransferClient;
  private readonly chunkSize: number;
  private readonly progressIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly onProgress: (_task: Task) => void;
  private readonly estimator: SpeedEstimator;

  constructor(task: Task, options: TransferWorkerOptions) {
    this.task = task;
    this.client = options.client;
    this.chunkSize = options.chunkSize ?? config.transfers.chunkSize;
    this.progressIntervalMs = options.progressIntervalMs ?? config.transfers.progressIntervalMs;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.network.requestTimeoutMs;
    this.onProgress = options.onProgress ?? (() => {});
    this.estimator = new SpeedEstimator(options.speedWindowMs ?? config.transfers.speedWindowMs);
  }

  async run(): Promise<WorkerOutcome> {
    const { task } = this;
    const signal = task.signal;
    let failure: TransferError | null = null;

    try {
      await this.transfer(signal);
    } catch (error) {
      if (!signal.aborted) {
        failure = toTransferError(error);
        log.error(`Error en transferencia ${task.id}: ${failure.message}`);
      }
    }

    // Una tarea en pausa no pasa a terminal hasta que la reanuden o la cancelen
    await task.pauseGate.wait(signal);

    if (signal.aborted) {
      await removeFileIfExists(task.destination);
      log.info(`Transferencia cancelada: ${task.id}, archivo parcial eliminado`);
      return { type: 'cancelled' };
    }
    if (failure) {
      return { type: 'failed', error: failure };
    }
    log.info(`Transferencia completada: ${task.id} (${task.metrics.downloadedSize} bytes)`);
    return { type: 'completed' };
  }

  private async transfer(signal: AbortSignal): Promise<void> {
    const { task } = this;
    const resumeOffset = (await getFileSize(task.destination)) ?? 0;
    if (resumeOffset > 0) {
      log.info(`Reanudando transferencia ${task.id} desde byte ${resumeOffset}`);
    }

    const opened = await this.openResponse(resumeOffset, signal);
    if (!opened) return;
    const { response, offset } = opened;

    const contentLength = parseContentLength(response.headers['content-length']);
    const metrics = task.metrics;
    metrics.totalSize = contentLength !== null ? contentLength + offset : 0;
    metrics.downloadedSize = offset;
    metrics.progressPercent = computeProgressPercent(offset, metrics.totalSize);
    metrics.lastUpdate = Date.now();

    let handle: fs.FileHandle | null = null;
    try {
      await ensureParentDirectory(task.destination);
      handle = await fs.open(task.destination, offset > 0 ? 'a' : 'w');
      await this.pump(response, handle, signal);
    } finally {
      response.destroy();
      if (handle) await handle.close();
    }

    if (signal.aborted) return;

    if (metrics.totalSize > 0 && metrics.downloadedSize < metrics.totalSize) {
      throw new TransferError(
        `${ERRORS.TRANSFER.PREMATURE_CLOSE}: ${metrics.downloadedSize}/${metrics.totalSize} bytes`
      );
    }
    this.updateMetrics(Date.now(), 0, 0);
  }

  /**
   * Abre la respuesta respetando el offset. Devuelve el offset efectivo: 0 si el servidor
   * ignoró o rechazó el rango. null si la tarea se canceló durante la petición.
   */
  private async openResponse(
    resumeOffset: number,
    signal: AbortSignal
  ): Promise<OpenedTransfer | null> {
    const { task } = this;
    let response = await this.request(resumeOffset, signal);
    if (signal.aborted) {
      response.destroy();
      return null;
    }
    let offset = resumeOffset;

    if (resumeOffset > 0 && response.statusCode === 416) {
      log.warn(
        `${ERRORS.TRANSFER.RANGE_NOT_SATISFIABLE} (${task.id}), reiniciando desde el principio`
      );
      response.destroy();
      await removeFileIfExists(task.destination);
      response = await this.request(0, signal);
      if (signal.aborted) {
        response.destroy();
        return null;
      }
      offset = 0;
    } else if (resumeOffset > 0 && response.statusCode === 200) {
      log.warn(`El servidor ignoró Range para ${task.id}, truncando y reiniciando desde 0`);
      offset = 0;
    }

    if (response.statusCode !== 200 && response.statusCode !== 206) {
      response.destroy();
      throw new TransferError(`${ERRORS.TRANSFER.HTTP_STATUS}: HTTP ${response.statusCode}`, {
        statusCode: response.statusCode,
      });
    }

    return { response, offset };
  }

  private request(offset: number, signal: AbortSignal): Promise<TransferResponse> {
    const headers: Record<string, string> = { ...this.task.headers };
    if (offset > 0) {
      headers['Range'] = `bytes=${offset}-`;
    }
    return this.client.open({
      url: this.task.url,
      headers,
      signal,
      timeoutMs: this.requestTimeoutMs,
    });
  }

  private async pump(
    response: TransferResponse,
    handle: fs.FileHandle,
    signal: AbortSignal
  ): Promise<void> {
    const { task } = this;
    const metrics = task.metrics;
    const iterator = response.body[Symbol.asyncIterator]();
    let lastSampleTime = Date.now();
    let lastSampleBytes = metrics.downloadedSize;

    for (;;) {
      const next = await this.readNext(iterator, signal);
      if (next.done) return;
      const data: Uint8Array = next.value;

      for (let position = 0; position < data.length; position += this.chunkSize) {
        if (signal.aborted) return;

        if (task.pauseGate.isPaused) {
          metrics.speedBps = 0;
          metrics.etaSeconds = null;
          this.estimator.reset();
          await task.pauseGate.wait(signal);
          if (signal.aborted) return;
          // El tiempo en pausa no cuenta para la velocidad
          lastSampleTime = Date.now();
          lastSampleBytes = metrics.downloadedSize;
        }

        const chunk = data.subarray(position, position + this.chunkSize);
        if (metrics.totalSize > 0 && metrics.downloadedSize + chunk.length > metrics.totalSize) {
          throw new TransferError(
            `${ERRORS.TRANSFER.SIZE_EXCEEDED}: ${metrics.downloadedSize + chunk.length}/${metrics.totalSize}`
          );
        }

        await handle.write(chunk);
        metrics.downloadedSize += chunk.length;

        const now = Date.now();
        if (now - lastSampleTime >= this.progressIntervalMs) {
          this.updateMetrics(
            now,
            metrics.downloadedSize - lastSampleBytes,
            (now - lastSampleTime) / 1000
          );
          lastSampleTime = now;
          lastSampleBytes = metrics.downloadedSize;
          if (!signal.aborted) this.onProgress(task);
        }
      }
    }
  }

  private updateMetrics(now: number, deltaBytes: number, deltaSeconds: number): void {
    const metrics = this.task.metrics;
    this.estimator.sample(now, deltaBytes, deltaSeconds);
    metrics.speedBps = this.estimator.speed();
    const eta = this.estimator.eta(metrics.totalSize, metrics.downloadedSize);
    metrics.etaSeconds = eta === null ? null : Math.round(eta);
    metrics.progressPercent = computeProgressPercent(metrics.downloadedSize, metrics.totalSize);
    if (metrics.startTime !== null) {
      metrics.elapsedSeconds = (now - metrics.startTime) / 1000;
    }
    metrics.lastUpdate = now;
  }

  /**
   * Siguiente bloque del cuerpo, acotado por el timeout de lectura. La cancelación
   * resuelve como fin de stream; la lectura pendiente se descarta al destruir la respuesta.
   */
  private readNext(
    iterator: AsyncIterator<Uint8Array>,
    signal: AbortSignal
  ): Promise<IteratorResult<Uint8Array>> {
    if (signal.aborted) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise<IteratorResult<Uint8Array>>((resolve, reject) => {
      const settle = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        settle();
        resolve({ done: true, value: undefined });
      };
      const timer = setTimeout(() => {
        settle();
        reject(
          new TransferError(`${ERRORS.TRANSFER.READ_TIMEOUT} (${this.requestTimeoutMs}ms)`)
        );
      }, this.requestTimeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });

      iterator.next().then(
        result => {
          settle();
          resolve(result);
        },
        (error: unknown) => {
          settle();
          reject(error);
        }
      );
    });
  }
}

/** Envuelve cualquier fallo de red o disco en un TransferError reintentable. */
export function toTransferError(error: unknown): TransferError {
  if (error instanceof TransferError) return error;
  const code = errnoCode(error);
  const isFileError = code !== undefined && FILE_ERROR_CODES.has(code);
  const prefix = isFileError ? ERRORS.TRANSFER.FILE : ERRORS.TRANSFER.NETWORK;
  return new TransferError(`${prefix}: ${errorMessage(error)}`, { cause: error });
}

export default TransferWorker;
