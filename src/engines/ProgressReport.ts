/**
 * Reporte de diagnóstico: estadísticas globales y una entrada por tarea en MB.
 *
 * @module engines/ProgressReport
 */

import { writeJSONFile } from '../utils/fileHelpers';
import { bytesToMb } from '../utils/format';
import { logger } from '../utils/logger';
import type { GlobalStats, TaskSnapshot, TaskStatusType } from './types';

const log = logger.child('ProgressReport');

export interface ReportTaskEntry {
  id: string;
  name: string;
  description: string;
  status: TaskStatusType;
  progressPercent: number | null;
  totalSizeMb: number;
  downloadedSizeMb: number;
  speedMbps: number;
  etaSeconds: number | null;
  elapsedSeconds: number;
  retryCount: number;
  errorMessage: string | null;
  /** ISO 8601. */
  createdAt: string;
}

export interface ReportGlobalStats {
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  totalDownloadedMb: number;
  activeDownloads: number;
  currentTotalSpeedMbps: number;
  tasksInQueue: number;
}

export interface ProgressReport {
  /** ISO 8601. */
  timestamp: string;
  globalStats: ReportGlobalStats;
  tasks: ReportTaskEntry[];
}

export function toReportEntry(task: TaskSnapshot): ReportTaskEntry {
  const { metrics } = task;
  return {
    id: task.id,
    name: task.name,
    description: task.description,
    status: task.status,
    progressPercent: metrics.progressPercent,
    totalSizeMb: bytesToMb(metrics.totalSize),
    downloadedSizeMb: bytesToMb(metrics.downloadedSize),
    speedMbps: bytesToMb(metrics.speedBps),
    etaSeconds: metrics.etaSeconds,
    elapsedSeconds: metrics.elapsedSeconds,
    retryCount: task.retryCount,
    errorMessage: task.errorMessage,
    createdAt: new Date(task.createdAt).toISOString(),
  };
}

export function buildProgressReport(
  tasks: readonly TaskSnapshot[],
  stats: GlobalStats,
  now: number = Date.now()
): ProgressReport {
  return {
    timestamp: new Date(now).toISOString(),
    globalStats: {
      totalTasks: stats.totalTasks,
      completedTasks: stats.completedTasks,
      failedTasks: stats.failedTasks,
      totalDownloadedMb: stats.totalDownloadedMb,
      activeDownloads: stats.activeDownloads,
      currentTotalSpeedMbps: stats.currentTotalSpeedMbps,
      tasksInQueue: stats.tasksInQueue,
    },
    tasks: tasks.map(toReportEntry),
  };
}

export async function writeProgressReport(filePath: string, report: ProgressReport): Promise<void> {
  const done = log.startOperation(`Exportar reporte ${filePath}`);
  await writeJSONFile(filePath, report);
  done(`${report.tasks.length} tareas`);
}
