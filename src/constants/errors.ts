/**
 * @fileoverview Textos de error del gestor de transferencias.
 * @module constants/errors
 *
 * Fuente única de verdad para los mensajes que viajan en las excepciones de API
 * (src/errors.ts) y en el errorMessage de una tarea FAILED.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS = {
  UNKNOWN: 'Error desconocido',
  UNEXPECTED: 'Error inesperado',
  VALIDATION_FAILED: 'Parámetros inválidos',
} as const;

// =====================
// ERRORES DE TAREAS (uso indebido de la API)
// =====================

export const TASK_ERRORS = {
  DUPLICATE: 'Ya existe una tarea con ese id',
  NOT_FOUND: 'Tarea no encontrada',
  INVALID_TRANSITION: 'Transición de estado no permitida',
  ALREADY_RUNNING: 'La tarea ya está en curso',
  RETRIES_EXHAUSTED: 'Se alcanzó el número máximo de reintentos',
  STILL_ACTIVE: 'No se puede eliminar una tarea activa',
} as const;

// =====================
// ERRORES DE TRANSFERENCIA
// =====================

export const TRANSFER_ERRORS = {
  NETWORK: 'Error de red',
  FILE: 'Error de archivo',
  HTTP_STATUS: 'Respuesta HTTP inesperada',
  READ_TIMEOUT: 'Tiempo de espera agotado leyendo la respuesta',
  SIZE_EXCEEDED: 'El servidor envió más bytes de los anunciados',
  RANGE_NOT_SATISFIABLE: 'El servidor rechazó el rango solicitado',
  PREMATURE_CLOSE: 'Conexión cerrada prematuramente',
} as const;

// =====================
// ERRORES DE CALLBACKS
// =====================

export const CALLBACK_ERRORS = {
  TASK_CALLBACK_FAILED: 'Error en callback de tarea',
  GLOBAL_CALLBACK_FAILED: 'Error en callback global',
} as const;

export const ERRORS = {
  GENERAL: GENERAL_ERRORS,
  TASK: TASK_ERRORS,
  TRANSFER: TRANSFER_ERRORS,
  CALLBACK: CALLBACK_ERRORS,
} as const;

export type ErrorsMap = typeof ERRORS;

export default ERRORS;
