/**
 * Bus de eventos entre el motor de transferencias y sus consumidores (UI, CLI,
 * extracción/verificación que esperan `completed`).
 *
 * Dos listas: callbacks por tarea `(snapshot, event)` y callbacks globales
 * `(event, snapshot, taskId)`. El despacho es síncrono desde quien produce el evento.
 * Cada lista se copia antes de recorrerla y cada callback corre aislado: una excepción
 * se registra como CallbackError y no interrumpe al worker ni a los demás callbacks.
 *
 * @module EventBus
 */

import { logger } from '../utils/logger';
import { CallbackError } from '../errors';
import { ERRORS } from '../constants/errors';
import type { TaskEventType, TaskSnapshot } from './types';

const log = logger.child('EventBus');

export type TaskCallback = (_task: TaskSnapshot, _event: TaskEventType) => void;
export type GlobalCallback = (_event: TaskEventType, _task: TaskSnapshot, _taskId: string) => void;
export type Unsubscribe = () => void;

export class EventBus {
  private taskCallbacks = new Map<string, TaskCallback[]>();
  private globalCallbacks: GlobalCallback[] = [];

  onTask(taskId: string, callback: TaskCallback): Unsubscribe {
    const list = this.taskCallbacks.get(taskId) ?? [];
    this.taskCallbacks.set(taskId, [...list, callback]);
    return () => {
      const current = this.taskCallbacks.get(taskId);
      if (!current) return;
      const next = current.filter(cb => cb !== callback);
      if (next.length > 0) {
        this.taskCallbacks.set(taskId, next);
      } else {
        this.taskCallbacks.delete(taskId);
      }
    };
  }

  onAny(callback: GlobalCallback): Unsubscribe {
    this.globalCallbacks = [...this.globalCallbacks, callback];
    return () => {
      this.globalCallbacks = this.globalCallbacks.filter(cb => cb !== callback);
    };
  }

  /** Despacha a los callbacks de la tarea y después a los globales. */
  emit(task: TaskSnapshot, event: TaskEventType): void {
    const taskListeners = this.taskCallbacks.get(task.id) ?? [];
    for (const callback of taskListeners) {
      try {
        callback(task, event);
      } catch (error) {
        this.reportCallbackError(ERRORS.CALLBACK.TASK_CALLBACK_FAILED, task.id, event, error);
      }
    }
    this.emitGlobal(task, event);
  }

  /** Solo callbacks globales (p. ej. `created`, antes de que nadie pueda suscribirse a la tarea). */
  emitGlobal(task: TaskSnapshot, event: TaskEventType): void {
    const globalListeners = this.globalCallbacks;
    for (const callback of globalListeners) {
      try {
        callback(event, task, task.id);
      } catch (error) {
        this.reportCallbackError(ERRORS.CALLBACK.GLOBAL_CALLBACK_FAILED, task.id, event, error);
      }
    }
  }

  listenerCount(taskId?: string): number {
    if (taskId !== undefined) {
      return this.taskCallbacks.get(taskId)?.length ?? 0;
    }
    return this.globalCallbacks.length;
  }

  removeTask(taskId: string): void {
    this.taskCallbacks.delete(taskId);
  }

  /** Quita todos los callbacks (teardown del registro). */
  clear(): void {
    this.taskCallbacks.clear();
    this.globalCallbacks = [];
  }

  private reportCallbackError(
    message: string,
    taskId: string,
    event: TaskEventType,
    cause: unknown
  ): void {
    const callbackError = new CallbackError(message, taskId, event, cause);
    log.error(callbackError.message, cause);
  }
}

export default EventBus;
