/**
 * Gestor concurrente de transferencias: API pública del paquete.
 *
 * @module transfer-task-manager
 */

export * from './engines';
export * from './errors';
export { ERRORS } from './constants/errors';
export { default as config } from './config';
export type { AppConfig, TransfersConfig, NetworkConfig } from './config';
export {
  logger,
  configureLogger,
  formatSize,
  formatSpeed,
  formatDuration,
  bytesToMb,
  BYTES_PER_MB,
  validateCreateTask,
  validateRegistrySettings,
} from './utils';
