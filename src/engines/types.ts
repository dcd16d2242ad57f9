/**
 * Tipos compartidos del motor de transferencias: estados, eventos, métricas y snapshots.
 *
 * @module engines/types
 */

/** Estados de una tarea (valores en minúsculas, también en el reporte). */
export const TaskStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  PAUSED: 'paused',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type TaskStatusType = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Eventos por tarea; `created` solo llega a los callbacks globales. */
export const TaskEvent = {
  CREATED: 'created',
  STARTED: 'started',
  PROGRESS: 'progress',
  PAUSED: 'paused',
  RESUMED: 'resumed',
  RETRYING: 'retrying',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type TaskEventType = (typeof TaskEvent)[keyof typeof TaskEvent];

export interface TaskMetrics {
  /** 0 = desconocido (sin Content-Length). */
  totalSize: number;
  downloadedSize: number;
  /** null mientras totalSize sea desconocido. */
  progressPercent: number | null;
  speedBps: number;
  etaSeconds: number | null;
  elapsedSeconds: number;
  /** Epoch ms. */
  startTime: number | null;
  lastUpdate: number | null;
}

/** Copia inmutable de una tarea; es lo único que ven los lectores. */
export interface TaskSnapshot {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly url: string;
  readonly destination: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly status: TaskStatusType;
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly errorMessage: string | null;
  /** Epoch ms. */
  readonly createdAt: number;
  readonly metrics: Readonly<TaskMetrics>;
}

export interface GlobalStats {
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  totalDownloadedBytes: number;
  totalDownloadedMb: number;
  activeDownloads: number;
  currentTotalSpeedBps: number;
  currentTotalSpeedMbps: number;
  tasksInQueue: number;
}

export function createEmptyMetrics(): TaskMetrics {
  return {
    totalSize: 0,
    downloadedSize: 0,
    progressPercent: null,
    speedBps: 0,
    etaSeconds: null,
    elapsedSeconds: 0,
    startTime: null,
    lastUpdate: null,
  };
}

/** downloaded/total × 100 acotado a [0, 100]; null si total es desconocido. */
export function computeProgressPercent(downloadedSize: number, totalSize: number): number | null {
  if (totalSize <= 0) return null;
  return Math.min(100, Math.max(0, (downloadedSize / totalSize) * 100));
}
