/**
 * @fileoverview Sistema de logging centralizado (electron-log, entrada Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child) y operaciones cronometradas.
 * Bajo NODE_ENV=test el transport de archivo queda desactivado y la consola solo muestra errores.
 */

import log from 'electron-log/node';
import type { LevelOption } from 'electron-log';
import path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ConfigureLoggerOptions {
  fileLevel?: LevelOption;
  consoleLevel?: LevelOption;
  maxSize?: number;
  isDev?: boolean;
}

const isTestEnv = process.env.NODE_ENV === 'test';

if (isTestEnv) {
  log.transports.file.level = false;
  log.transports.console.level = 'error';
}

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

type LogFn = (...args: unknown[]) => void;

export interface ScopedLogger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogLevel): LogFn =>
    (...args: unknown[]) => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const scoped: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    debug: logMethod('debug'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.info(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        baseChildLog.info(`✓ ${operation}: ${result} (${Date.now() - start}ms)`);
      };
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, scoped);
  return scoped;
}

/**
 * Configura el logger global (archivo y consola).
 * Por defecto: fileLevel 'info', consoleLevel 'debug', maxSize 10 MB.
 * Fuera de desarrollo la consola usa nivel 'warn'.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): typeof log {
  const {
    fileLevel = 'info',
    consoleLevel = 'debug',
    maxSize = 10 * 1024 * 1024,
    isDev = process.env.NODE_ENV === 'development',
  } = options;

  log.transports.file.level = isTestEnv ? false : fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.archiveLogFn = oldLogFile => {
    const info = path.parse(oldLogFile.path);
    const timestamp = new Date().toISOString().split('T')[0];
    return path.join(info.dir, `${info.name}-${timestamp}${info.ext}`);
  };
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';

  log.transports.console.level = isTestEnv ? 'error' : isDev ? consoleLevel : 'warn';
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  log.info('Logger inicializado');
  log.info(`Modo: ${isDev ? 'Desarrollo' : 'Producción'}`);

  return log;
}

/** Ruta absoluta del archivo de log actual, o null si no está disponible. */
export function getLogFilePath(): string | null {
  return log.transports.file.getFile()?.path ?? null;
}

export const logger = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  configure: configureLogger,
  getFilePath: getLogFilePath,
};
