/**
 * Máquina de estados explícita para tareas de transferencia.
 *
 * Cualquier transición no listada es inválida. PENDING solo se alcanza de nuevo
 * desde FAILED (retry manual) o desde RUNNING cuando la RetryPolicy programa
 * un reintento automático. Un worker en pausa no termina hasta que lo reanudan
 * o lo cancelan, así que PAUSED solo sale hacia RUNNING o CANCELLED.
 *
 * @module TaskStateMachine
 */

import { TaskStatus, type TaskStatusType } from './types';

const TRANSITIONS: Record<TaskStatusType, readonly TaskStatusType[]> = {
  [TaskStatus.PENDING]: [TaskStatus.RUNNING],
  [TaskStatus.RUNNING]: [
    TaskStatus.PAUSED,
    TaskStatus.COMPLETED,
    TaskStatus.FAILED,
    TaskStatus.CANCELLED,
    TaskStatus.PENDING,
  ],
  [TaskStatus.PAUSED]: [TaskStatus.RUNNING, TaskStatus.CANCELLED],
  [TaskStatus.COMPLETED]: [],
  [TaskStatus.FAILED]: [TaskStatus.PENDING],
  [TaskStatus.CANCELLED]: [],
};

export function canTransition(from: TaskStatusType, to: TaskStatusType): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Estados con un worker vivo (en red o aparcado en pausa). */
export const ACTIVE_STATUSES: readonly TaskStatusType[] = [TaskStatus.RUNNING, TaskStatus.PAUSED];

export const TERMINAL_STATUSES: readonly TaskStatusType[] = [
  TaskStatus.COMPLETED,
  TaskStatus.FAILED,
  TaskStatus.CANCELLED,
];

export function isActiveStatus(status: TaskStatusType): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminalStatus(status: TaskStatusType): boolean {
  return TERMINAL_STATUSES.includes(status);
}
