/**
 * @fileoverview Utilidades de archivo para el worker y el export de diagnóstico
 * @module fileHelpers
 */

import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage } from '../errors';
import { logger } from './logger';

const log = logger.child('FileUtils');

/** Código errno de un error de fs; comprobación estructural, sirve entre realms. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/** Tamaño del archivo en bytes, o null si no existe. */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return null;
    throw error;
  }
}

export async function ensureParentDirectory(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
}

/**
 * Elimina el archivo si existe. Devuelve true si quedó ausente; los errores
 * distintos de ENOENT se registran y devuelven false.
 */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    log.debug(`Archivo eliminado: ${filePath}`);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return true;
    log.error('Error eliminando archivo:', {
      path: filePath,
      error: errorMessage(error),
      code: errnoCode(error),
    });
    return false;
  }
}

export async function writeJSONFile(filePath: string, data: unknown): Promise<void> {
  await ensureParentDirectory(filePath);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}
