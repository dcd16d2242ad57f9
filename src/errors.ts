/**
 * Jerarquía de errores del gestor de transferencias.
 *
 * Solo los errores de uso indebido (DuplicateTaskError, NotFoundError, ValidationError)
 * salen de la API de forma síncrona. InvalidTransitionError lo lanza la transición interna
 * y la API lo traduce a `false`. TransferError y CallbackError nunca llegan al llamador:
 * se reflejan en el estado de la tarea o quedan en el log.
 *
 * @module errors
 */

import { ERRORS } from './constants/errors';

export type ErrorCode =
  | 'DUPLICATE_TASK'
  | 'TASK_NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'INVALID_TRANSITION'
  | 'TRANSFER_FAILED'
  | 'CALLBACK_FAILED';

export class TransferManagerError extends Error {
  readonly code: ErrorCode;
  readonly context?: string;

  constructor(code: ErrorCode, message: string, context?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

export class DuplicateTaskError extends TransferManagerError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('DUPLICATE_TASK', `${ERRORS.TASK.DUPLICATE}: ${taskId}`, taskId);
    this.taskId = taskId;
  }
}

export class NotFoundError extends TransferManagerError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('TASK_NOT_FOUND', `${ERRORS.TASK.NOT_FOUND}: ${taskId}`, taskId);
    this.taskId = taskId;
  }
}

export class ValidationError extends TransferManagerError {
  constructor(detail: string, context?: string) {
    super('VALIDATION_FAILED', `${ERRORS.GENERAL.VALIDATION_FAILED}: ${detail}`, context);
  }
}

export class InvalidTransitionError extends TransferManagerError {
  readonly taskId: string;
  readonly from: string;
  readonly to: string;

  constructor(taskId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `${ERRORS.TASK.INVALID_TRANSITION}: ${from} -> ${to}`, taskId);
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export interface TransferErrorOptions {
  statusCode?: number;
  cause?: unknown;
  retryable?: boolean;
}

/**
 * Fallo de red o de disco durante una transferencia. `retryable` decide si la
 * RetryPolicy puede consumir presupuesto de reintentos con él.
 */
export class TransferError extends TransferManagerError {
  readonly statusCode?: number;
  readonly retryable: boolean;
  override readonly cause?: unknown;

  constructor(message: string, options: TransferErrorOptions = {}) {
    super('TRANSFER_FAILED', message);
    this.statusCode = options.statusCode;
    this.cause = options.cause;
    this.retryable = options.retryable ?? true;
  }
}

export class CallbackError extends TransferManagerError {
  readonly taskId: string;
  readonly event: string;
  override readonly cause: unknown;

  constructor(message: string, taskId: string, event: string, cause: unknown) {
    const detail = errorMessage(cause);
    super('CALLBACK_FAILED', `${message} (${taskId}/${event}): ${detail}`, taskId);
    this.taskId = taskId;
    this.event = event;
    this.cause = cause;
  }
}

/** Mensaje legible de cualquier valor lanzado. */
export function errorMessage(error: unknown): string {
  if (typeof error === 'string' && error) return error;
  // Estructural: los errores de otro realm no pasan instanceof Error
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string' && message) return message;
  }
  return ERRORS.GENERAL.UNKNOWN;
}
