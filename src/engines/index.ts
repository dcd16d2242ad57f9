/**
 * Punto de entrada del motor de transferencias: reexporta TaskRegistry, Task,
 * TransferWorker, TransferClient, SpeedEstimator, RetryPolicy, EventBus, PauseGate,
 * la máquina de estados, el reporte y los tipos compartidos.
 *
 * @module engines
 */

export { default as TaskRegistry } from './TaskRegistry';
export type { TaskRegistryOptions, ResolvedRegistrySettings } from './TaskRegistry';
export { default as Task } from './Task';
export type { TaskInit } from './Task';
export { default as TransferWorker, toTransferError } from './TransferWorker';
export type { WorkerOutcome, TransferWorkerOptions } from './TransferWorker';
export {
  default as AxiosTransferClient,
  normalizeHeaders,
  parseContentLength,
} from './TransferClient';
export type {
  TransferClient,
  TransferRequest,
  TransferResponse,
  AxiosTransferClientOptions,
} from './TransferClient';
export { default as SpeedEstimator } from './SpeedEstimator';
export type { SpeedSample } from './SpeedEstimator';
export { default as RetryPolicy, isRetryableError, isRetryableStatus } from './RetryPolicy';
export type { RetryBackoff, RetryDecision, RetryPolicyOptions } from './RetryPolicy';
export { default as EventBus } from './EventBus';
export type { TaskCallback, GlobalCallback, Unsubscribe } from './EventBus';
export { default as PauseGate } from './PauseGate';
export {
  canTransition,
  isActiveStatus,
  isTerminalStatus,
  ACTIVE_STATUSES,
  TERMINAL_STATUSES,
} from './TaskStateMachine';
export { buildProgressReport, toReportEntry, writeProgressReport } from './ProgressReport';
export type { ProgressReport, ReportTaskEntry, ReportGlobalStats } from './ProgressReport';
export { TaskStatus, TaskEvent, createEmptyMetrics, computeProgressPercent } from './types';
export type {
  TaskStatusType,
  TaskEventType,
  TaskMetrics,
  TaskSnapshot,
  GlobalStats,
} from './types';
