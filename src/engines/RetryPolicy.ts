/**
 * Reintentos automáticos acotados para transferencias fallidas.
 *
 * decide() recibe el retryCount actual y el error; si queda presupuesto y el error es
 * reintentable devuelve el delay a esperar antes de volver a start(). El presupuesto es
 * el mismo que consume retry() manual: con retryCount == maxRetries ya no hay reintentos.
 *
 * Delay fijo por defecto; con backoff 'exponential' crece como base·2^n con jitter
 * de hasta un 30 %, acotado por maxRetryDelayMs.
 *
 * Cualquier respuesta HTTP fallida consume presupuesto. Con `failFastOnClientError`
 * los 4xx definitivos (todos salvo 408 y 429) pasan a FAILED sin reintentar.
 *
 * @module engines/RetryPolicy
 */

import { TransferError } from '../errors';

export type RetryBackoff = 'fixed' | 'exponential';

export interface RetryPolicyOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  backoff?: RetryBackoff;
  failFastOnClientError?: boolean;
  /** Fuente de aleatoriedad para el jitter, en [0, 1). */
  random?: () => number;
}

export type RetryDecision =
  | { retry: true; delayMs: number; attempt: number }
  | { retry: false; reason: 'exhausted' | 'not_retryable' };

const JITTER_FACTOR = 0.3;

export class RetryPolicy {
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly maxRetryDelayMs: number;
  readonly backoff: RetryBackoff;
  readonly failFastOnClientError: boolean;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 30000;
    this.backoff = options.backoff ?? 'fixed';
    this.failFastOnClientError = options.failFastOnClientError ?? false;
    this.random = options.random ?? Math.random;
  }

  hasBudget(retryCount: number, maxRetries = this.maxRetries): boolean {
    return retryCount < maxRetries;
  }

  /** Delay en ms antes del reintento número `retryCount + 1`. */
  calculateDelay(retryCount: number): number {
    if (this.backoff === 'fixed') {
      return this.retryDelayMs;
    }
    const exponentialDelay = this.retryDelayMs * Math.pow(2, retryCount);
    const jitter = this.random() * JITTER_FACTOR * exponentialDelay;
    return Math.min(exponentialDelay + jitter, this.maxRetryDelayMs);
  }

  decide(retryCount: number, error: unknown, maxRetries = this.maxRetries): RetryDecision {
    if (!isRetryableError(error) || (this.failFastOnClientError && isDefinitiveClientError(error))) {
      return { retry: false, reason: 'not_retryable' };
    }
    if (!this.hasBudget(retryCount, maxRetries)) {
      return { retry: false, reason: 'exhausted' };
    }
    return { retry: true, delayMs: this.calculateDelay(retryCount), attempt: retryCount + 1 };
  }
}

/** Todo fallo es reintentable salvo un TransferError marcado `retryable: false`. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransferError) return error.retryable;
  return true;
}

/** 408, 429 y 5xx pueden cambiar al repetir la petición; el resto de 4xx no. */
export function isRetryableStatus(statusCode: number): boolean {
  if (statusCode === 408 || statusCode === 429) return true;
  return statusCode >= 500;
}

function isDefinitiveClientError(error: unknown): boolean {
  if (!(error instanceof TransferError) || error.statusCode === undefined) return false;
  return !isRetryableStatus(error.statusCode);
}

export default RetryPolicy;
