/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 */

export {
  logger,
  configureLogger,
  createScopedLogger,
  getLogFilePath,
  formatObject,
} from './logger';
export type { ScopedLogger, LogLevel, ConfigureLoggerOptions } from './logger';

export * from './fileHelpers';
export * from './format';

export {
  schemas,
  validate,
  validateCreateTask,
  validateRegistrySettings,
} from './schemas';
export type { CreateTaskParams, RegistrySettings, ZodValidationResult } from './schemas';
