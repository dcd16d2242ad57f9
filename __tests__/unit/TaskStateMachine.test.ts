/**
 * Tests unitarios para src/engines/TaskStateMachine.ts
 */
import {
  canTransition,
  isActiveStatus,
  isTerminalStatus,
} from '../../src/engines/TaskStateMachine';
import { TaskStatus, type TaskStatusType } from '../../src/engines/types';

const ALL: TaskStatusType[] = Object.values(TaskStatus);

function targetsOf(from: TaskStatusType): TaskStatusType[] {
  return ALL.filter(to => canTransition(from, to));
}

describe('TaskStateMachine', () => {
  it('PENDING solo debe pasar a RUNNING', () => {
    expect(targetsOf(TaskStatus.PENDING)).toEqual([TaskStatus.RUNNING]);
  });

  it('RUNNING debe admitir pausa, fin, cancelación y reinicio por reintento', () => {
    expect(targetsOf(TaskStatus.RUNNING)).toEqual([
      TaskStatus.PENDING,
      TaskStatus.PAUSED,
      TaskStatus.COMPLETED,
      TaskStatus.FAILED,
      TaskStatus.CANCELLED,
    ]);
  });

  it('PAUSED solo debe volver a RUNNING o pasar a CANCELLED', () => {
    expect(targetsOf(TaskStatus.PAUSED)).toEqual([TaskStatus.RUNNING, TaskStatus.CANCELLED]);
  });

  it('FAILED solo debe volver a PENDING', () => {
    expect(targetsOf(TaskStatus.FAILED)).toEqual([TaskStatus.PENDING]);
  });

  it('COMPLETED y CANCELLED no deben tener salidas', () => {
    expect(targetsOf(TaskStatus.COMPLETED)).toEqual([]);
    expect(targetsOf(TaskStatus.CANCELLED)).toEqual([]);
  });

  it('debe clasificar estados activos y terminales', () => {
    expect(ALL.filter(isActiveStatus)).toEqual([TaskStatus.RUNNING, TaskStatus.PAUSED]);
    expect(ALL.filter(isTerminalStatus)).toEqual([
      TaskStatus.COMPLETED,
      TaskStatus.FAILED,
      TaskStatus.CANCELLED,
    ]);
  });
});
