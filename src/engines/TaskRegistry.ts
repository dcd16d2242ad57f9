/**
 * TaskRegistry - Orquestador de tareas de transferencia
 *
 * Crea, arranca, pausa, reanuda, cancela, reintenta y elimina tareas. Cada tarea
 * RUNNING o PAUSED tiene exactamente un TransferWorker vivo; el registro traduce el
 * WorkerOutcome a estado, eventos y estadísticas globales.
 *
 * Las mutaciones estructurales quedan serializadas por el event loop: cada método
 * público es síncrono entre la comprobación y la mutación que protege. Hacia fuera
 * solo salen snapshots.
 *
 * @module engines/TaskRegistry
 */

import config from '../config';
import { logger } from '../utils/logger';
import { validateCreateTask, validateRegistrySettings, type RegistrySettings } from '../utils/schemas';
import { bytesToMb } from '../utils/format';
import { removeFileIfExists } from '../utils/fileHelpers';
import {
  DuplicateTaskError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  errorMessage,
  type TransferError,
} from '../errors';
import { ERRORS } from '../constants/errors';
import { Task } from './Task';
import { TransferWorker, type WorkerOutcome } from './TransferWorker';
import { AxiosTransferClient, type TransferClient } from './TransferClient';
import { RetryPolicy } from './RetryPolicy';
import { EventBus, type GlobalCallback, type TaskCallback, type Unsubscribe } from './EventBus';
import { canTransition, isActiveStatus, isTerminalStatus } from './TaskStateMachine';
import { buildProgressReport, writeProgressReport, type ProgressReport } from './ProgressReport';
import {
  TaskEvent,
  TaskStatus,
  type GlobalStats,
  type TaskEventType,
  type TaskSnapshot,
  type TaskStatusType,
} from './types';

const log = logger.child('TaskRegistry');

export interface TaskRegistryOptions extends RegistrySettings {
  /** Cliente HTTP; por defecto AxiosTransferClient. */
  client?: TransferClient;
}

export type ResolvedRegistrySettings = Required<RegistrySettings>;

interface ActiveWorker {
  task: Task;
  done: Promise<void>;
}

interface RetryWait {
  timer: NodeJS.Timeout;
  promise: Promise<void>;
  resolve: () => void;
}

export class TaskRegistry {
  readonly settings: Readonly<ResolvedRegistrySettings>;
  readonly events = new EventBus();

  private readonly client: TransferClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly tasks = new Map<string, Task>();
  // Por entidad: un id eliminado y recreado no choca con el worker anterior que aún se desenrolla
  private readonly workers = new Map<Task, ActiveWorker>();
  private readonly retryWaits = new Map<string, RetryWait>();
  private closed = false;

  private readonly counters = {
    totalTasks: 0,
    completedTasks: 0,
    failedTasks: 0,
    totalDownloadedBytes: 0,
  };

  constructor(options: TaskRegistryOptions = {}) {
    const { client, ...overrides } = options;
    const validation = validateRegistrySettings(overrides);
    if (!validation.success || !validation.data) {
      throw new ValidationError(validation.error ?? ERRORS.GENERAL.UNKNOWN, 'TaskRegistryOptions');
    }
    const data = validation.data;

    this.settings = {
      maxRetries: data.maxRetries ?? config.transfers.maxRetries,
      retryDelayMs: data.retryDelayMs ?? config.network.retryDelayMs,
      maxRetryDelayMs: data.maxRetryDelayMs ?? config.network.maxRetryDelayMs,
      retryBackoff: data.retryBackoff ?? 'fixed',
      failFastOnClientError: data.failFastOnClientError ?? config.network.failFastOnClientError,
      chunkSize: data.chunkSize ?? config.transfers.chunkSize,
      progressIntervalMs: data.progressIntervalMs ?? config.transfers.progressIntervalMs,
      speedWindowMs: data.speedWindowMs ?? config.transfers.speedWindowMs,
      requestTimeoutMs: data.requestTimeoutMs ?? config.network.requestTimeoutMs,
    };

    this.client = client ?? new AxiosTransferClient();
    this.retryPolicy = new RetryPolicy({
      maxRetries: this.settings.maxRetries,
      retryDelayMs: this.settings.retryDelayMs,
      maxRetryDelayMs: this.settings.maxRetryDelayMs,
      backoff: this.settings.retryBackoff,
      failFastOnClientError: this.settings.failFastOnClientError,
    });
  }

  // ===========================================================================
  // CICLO DE VIDA
  // ===========================================================================

  create(
    id: string,
    name: string,
    url: string,
    destination: string,
    description = '',
    headers: Record<string, string> = {}
  ): TaskSnapshot {
    const validation = validateCreateTask({ id, name, url, destination, description, headers });
    if (!validation.success || !validation.data) {
      throw new ValidationError(validation.error ?? ERRORS.GENERAL.UNKNOWN, id);
    }
    const params = validation.data;

    if (this.tasks.has(params.id)) {
      throw new DuplicateTaskError(params.id);
    }

    const task = new Task({ ...params, maxRetries: this.settings.maxRetries });
    this.tasks.set(task.id, task);
    this.counters.totalTasks++;

    log.info(`Tarea creada: ${task.id} (${task.name}) -> ${task.destination}`);
    this.events.emitGlobal(task.snapshot(), TaskEvent.CREATED);
    return task.snapshot();
  }

  start(id: string): boolean {
    const task = this.lookup(id);
    if (!task) return false;

    if (this.closed) {
      log.warn(`Registro cerrado, no se inicia ${id}`);
      return false;
    }
    if (task.status !== TaskStatus.PENDING) {
      log.debug(`start(${id}) ignorado en estado ${task.status}`);
      return false;
    }
    if (this.workers.has(task)) {
      log.warn(`${ERRORS.TASK.ALREADY_RUNNING}: ${id}`);
      return false;
    }

    this.clearRetryWait(id);
    task.resetControl();
    this.transition(task, TaskStatus.RUNNING);
    task.metrics.startTime = Date.now();
    task.metrics.lastUpdate = task.metrics.startTime;
    this.spawnWorker(task);

    log.info(`Transferencia iniciada: ${id} (intento ${task.retryCount + 1})`);
    this.emit(task, TaskEvent.STARTED);
    return true;
  }

  pause(id: string): boolean {
    const task = this.lookup(id);
    if (!task || task.status !== TaskStatus.RUNNING) return false;

    task.pauseGate.pause();
    this.transition(task, TaskStatus.PAUSED);
    log.info(`Transferencia pausada: ${id}`);
    this.emit(task, TaskEvent.PAUSED);
    return true;
  }

  resume(id: string): boolean {
    const task = this.lookup(id);
    if (!task || task.status !== TaskStatus.PAUSED) return false;

    this.transition(task, TaskStatus.RUNNING);
    task.pauseGate.resume();
    log.info(`Transferencia reanudada: ${id}`);
    this.emit(task, TaskEvent.RESUMED);
    return true;
  }

  /**
   * Pasa la tarea a CANCELLED y aborta su worker. El archivo de destino lo borra el
   * worker al desenrollarse, no esta llamada: quien necesite el disco limpio debe
   * esperar a `whenIdle(id)`.
   */
  cancel(id: string): boolean {
    const task = this.lookup(id);
    if (!task || !isActiveStatus(task.status)) return false;

    this.transition(task, TaskStatus.CANCELLED);
    task.cancel();
    log.info(`Transferencia cancelada: ${id}`);
    this.emit(task, TaskEvent.CANCELLED);
    return true;
  }

  /** Reintento manual; comparte presupuesto con los automáticos. */
  retry(id: string): boolean {
    const task = this.lookup(id);
    if (!task || task.status !== TaskStatus.FAILED) return false;

    if (!this.retryPolicy.hasBudget(task.retryCount, task.maxRetries)) {
      log.warn(`${ERRORS.TASK.RETRIES_EXHAUSTED}: ${id} (${task.retryCount}/${task.maxRetries})`);
      return false;
    }

    this.resetForRetry(task);
    log.info(`Reintento manual ${task.retryCount}/${task.maxRetries}: ${id}`);
    this.emit(task, TaskEvent.RETRYING);
    return this.start(id);
  }

  /**
   * Quita una tarea no activa. Tras cancelar, el id queda libre en el acto aunque el
   * worker anterior siga borrando su archivo; `whenIdle(id)` ya no lo espera, `close()` sí.
   */
  remove(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    if (isActiveStatus(task.status)) {
      log.warn(`${ERRORS.TASK.STILL_ACTIVE}: ${id}`);
      return false;
    }

    this.clearRetryWait(id);
    this.tasks.delete(id);
    this.events.removeTask(id);
    log.debug(`Tarea eliminada: ${id}`);
    return true;
  }

  /** Elimina las tareas COMPLETED, FAILED y CANCELLED. */
  clearFinished(): number {
    let removed = 0;
    for (const task of [...this.tasks.values()]) {
      if (isTerminalStatus(task.status) && this.remove(task.id)) {
        removed++;
      }
    }
    if (removed > 0) {
      log.info(`${removed} tareas finalizadas eliminadas`);
    }
    return removed;
  }

  // ===========================================================================
  // CONSULTAS
  // ===========================================================================

  get(id: string): TaskSnapshot | null {
    return this.tasks.get(id)?.snapshot() ?? null;
  }

  require(id: string): TaskSnapshot {
    const task = this.tasks.get(id);
    if (!task) throw new NotFoundError(id);
    return task.snapshot();
  }

  list(): TaskSnapshot[] {
    return [...this.tasks.values()].map(task => task.snapshot());
  }

  listActive(): TaskSnapshot[] {
    return [...this.tasks.values()]
      .filter(task => isActiveStatus(task.status))
      .map(task => task.snapshot());
  }

  getGlobalStats(): GlobalStats {
    let activeDownloads = 0;
    let currentTotalSpeedBps = 0;
    let tasksInQueue = 0;

    for (const task of this.tasks.values()) {
      if (isActiveStatus(task.status)) {
        activeDownloads++;
        currentTotalSpeedBps += task.metrics.speedBps;
      } else if (task.status === TaskStatus.PENDING) {
        tasksInQueue++;
      }
    }

    return {
      ...this.counters,
      totalDownloadedMb: bytesToMb(this.counters.totalDownloadedBytes),
      activeDownloads,
      currentTotalSpeedBps,
      currentTotalSpeedMbps: bytesToMb(currentTotalSpeedBps),
      tasksInQueue,
    };
  }

  buildReport(): ProgressReport {
    return buildProgressReport(this.list(), this.getGlobalStats());
  }

  async exportReport(filePath: string): Promise<void> {
    await writeProgressReport(filePath, this.buildReport());
  }

  // ===========================================================================
  // SUSCRIPCIONES
  // ===========================================================================

  onTask(id: string, callback: TaskCallback): Unsubscribe {
    if (!this.tasks.has(id)) throw new NotFoundError(id);
    return this.events.onTask(id, callback);
  }

  onAny(callback: GlobalCallback): Unsubscribe {
    return this.events.onAny(callback);
  }

  // ===========================================================================
  // ESPERA Y CIERRE
  // ===========================================================================

  /** Resuelve cuando la tarea no tiene worker vivo ni reintento programado. */
  async whenIdle(id: string): Promise<void> {
    for (;;) {
      const task = this.tasks.get(id);
      const worker = task ? this.workers.get(task) : undefined;
      const pending = worker?.done ?? this.retryWaits.get(id)?.promise;
      if (!pending) return;
      await pending;
    }
  }

  /** Cancela lo activo, descarta reintentos programados y espera a los workers. */
  async close(): Promise<void> {
    this.closed = true;
    for (const task of [...this.tasks.values()]) {
      if (isActiveStatus(task.status)) {
        this.cancel(task.id);
      }
    }
    for (const id of [...this.retryWaits.keys()]) {
      this.clearRetryWait(id);
    }
    await Promise.all([...this.workers.values()].map(worker => worker.done));
    this.events.clear();
    log.info('Registro cerrado');
  }

  // ===========================================================================
  // INTERNOS
  // ===========================================================================

  private lookup(id: string): Task | undefined {
    const task = this.tasks.get(id);
    if (!task) {
      log.warn(`${ERRORS.TASK.NOT_FOUND}: ${id}`);
    }
    return task;
  }

  private transition(task: Task, to: TaskStatusType): void {
    if (!canTransition(task.status, to)) {
      throw new InvalidTransitionError(task.id, task.status, to);
    }
    log.debug(`${task.id}: ${task.status} -> ${to}`);
    task.status = to;
  }

  private emit(task: Task, event: TaskEventType): void {
    this.events.emit(task.snapshot(), event);
  }

  private spawnWorker(task: Task): void {
    const worker = new TransferWorker(task, {
      client: this.client,
      chunkSize: this.settings.chunkSize,
      progressIntervalMs: this.settings.progressIntervalMs,
      speedWindowMs: this.settings.speedWindowMs,
      requestTimeoutMs: this.settings.requestTimeoutMs,
      onProgress: current => {
        if (current.status === TaskStatus.RUNNING && this.tasks.get(current.id) === current) {
          this.emit(current, TaskEvent.PROGRESS);
        }
      },
    });

    const entry: ActiveWorker = { task, done: Promise.resolve() };
    entry.done = worker
      .run()
      .then(outcome => this.settle(entry, outcome))
      .catch((error: unknown) => {
        this.releaseWorker(entry);
        log.error(`${ERRORS.GENERAL.UNEXPECTED} al cerrar el worker de ${task.id}:`, error);
      });
    this.workers.set(task, entry);
  }

  private releaseWorker(entry: ActiveWorker): void {
    if (this.workers.get(entry.task) === entry) {
      this.workers.delete(entry.task);
    }
  }

  private async settle(entry: ActiveWorker, outcome: WorkerOutcome): Promise<void> {
    const { task } = entry;

    // Una pausa pedida justo cuando el worker terminaba
    while (task.status === TaskStatus.PAUSED) {
      await task.pauseGate.wait(task.signal);
    }

    this.releaseWorker(entry);

    if (task.status === TaskStatus.CANCELLED) {
      if (outcome.type !== 'cancelled') {
        await removeFileIfExists(task.destination);
      }
      return;
    }
    if (this.tasks.get(task.id) !== task) {
      log.debug(`Resultado de ${task.id} descartado: la tarea ya no está registrada`);
      return;
    }

    switch (outcome.type) {
      case 'completed':
        this.complete(task);
        break;
      case 'failed':
        this.fail(task, outcome.error);
        break;
      case 'cancelled':
        log.warn(`Worker de ${task.id} cancelado con la tarea en estado ${task.status}`);
        break;
    }
  }

  private complete(task: Task): void {
    const metrics = task.metrics;
    metrics.progressPercent = 100;
    metrics.etaSeconds = 0;
    this.transition(task, TaskStatus.COMPLETED);
    this.counters.completedTasks++;
    this.counters.totalDownloadedBytes += metrics.downloadedSize;
    this.emit(task, TaskEvent.COMPLETED);
  }

  private fail(task: Task, error: TransferError): void {
    const decision = this.retryPolicy.decide(task.retryCount, error, task.maxRetries);

    if (decision.retry) {
      this.resetForRetry(task);
      log.warn(
        `Reintento ${decision.attempt}/${task.maxRetries} de ${task.id} en ${decision.delayMs}ms: ${error.message}`
      );
      this.scheduleRetry(task, decision.delayMs);
      this.emit(task, TaskEvent.RETRYING);
      return;
    }

    task.errorMessage = errorMessage(error);
    this.transition(task, TaskStatus.FAILED);
    this.counters.failedTasks++;
    log.error(
      `Transferencia fallida: ${task.id} (${decision.reason}, ${task.retryCount}/${task.maxRetries}): ${task.errorMessage}`
    );
    this.emit(task, TaskEvent.FAILED);
  }

  private resetForRetry(task: Task): void {
    this.transition(task, TaskStatus.PENDING);
    task.retryCount++;
    task.errorMessage = null;
    task.resetMetrics();
  }

  private scheduleRetry(task: Task, delayMs: number): void {
    this.clearRetryWait(task.id);
    let resolve: () => void = () => {};
    const promise = new Promise<void>(done => {
      resolve = done;
    });
    const timer = setTimeout(() => {
      this.clearRetryWait(task.id);
      if (this.tasks.get(task.id) === task) {
        this.start(task.id);
      }
    }, delayMs);
    this.retryWaits.set(task.id, { timer, promise, resolve });
  }

  private clearRetryWait(id: string): void {
    const wait = this.retryWaits.get(id);
    if (!wait) return;
    clearTimeout(wait.timer);
    this.retryWaits.delete(id);
    wait.resolve();
  }
}

export default TaskRegistry;
