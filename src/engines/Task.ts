/**
 * Entidad Task: identidad, estado, métricas y controles (cancelación y pausa).
 *
 * Las métricas solo las escribe el TransferWorker activo de la tarea; el registro
 * las reinicia únicamente dentro de una mutación estructural (retry) cuando no hay
 * worker vivo. Hacia fuera solo salen snapshots.
 *
 * @module engines/Task
 */

import { PauseGate } from './PauseGate';
import {
  TaskStatus,
  createEmptyMetrics,
  type TaskMetrics,
  type TaskSnapshot,
  type TaskStatusType,
} from './types';

export interface TaskInit {
  id: string;
  name: string;
  description: string;
  url: string;
  destination: string;
  headers: Record<string, string>;
  maxRetries: number;
}

export class Task {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly url: string;
  readonly destination: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly maxRetries: number;
  readonly createdAt: number;

  status: TaskStatusType = TaskStatus.PENDING;
  retryCount = 0;
  errorMessage: string | null = null;
  metrics: TaskMetrics = createEmptyMetrics();

  readonly pauseGate = new PauseGate();
  private abortController = new AbortController();

  constructor(init: TaskInit) {
    this.id = init.id;
    this.name = init.name;
    this.description = init.description;
    this.url = init.url;
    this.destination = init.destination;
    this.headers = { ...init.headers };
    this.maxRetries = init.maxRetries;
    this.createdAt = Date.now();
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  cancel(): void {
    this.abortController.abort();
    // Un worker aparcado en la pausa despierta y ve la señal abortada
    this.pauseGate.resume();
  }

  /** Controles limpios para un nuevo worker. */
  resetControl(): void {
    if (this.abortController.signal.aborted) {
      this.abortController = new AbortController();
    }
    this.pauseGate.resume();
  }

  resetMetrics(): void {
    this.metrics = createEmptyMetrics();
  }

  snapshot(): TaskSnapshot {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      url: this.url,
      destination: this.destination,
      headers: { ...this.headers },
      status: this.status,
      retryCount: this.retryCount,
      maxRetries: this.maxRetries,
      errorMessage: this.errorMessage,
      createdAt: this.createdAt,
      metrics: { ...this.metrics },
    };
  }
}

export default Task;
