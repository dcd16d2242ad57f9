/**
 * @fileoverview Mensajes de validación usados por los schemas Zod.
 * @module constants/validations
 */

export const VALIDATIONS = {
  TASK: {
    ID_CANNOT_BE_EMPTY: 'El id de la tarea no puede estar vacío',
    ID_TOO_LONG: 'El id de la tarea es demasiado largo',
    NAME_CANNOT_BE_EMPTY: 'El nombre no puede estar vacío',
    NAME_TOO_LONG: 'El nombre es demasiado largo',
    DESCRIPTION_TOO_LONG: 'La descripción es demasiado larga',
  },
  URL: {
    INVALID: 'URL inválida',
    PROTOCOL_NOT_ALLOWED: 'Solo se permiten URLs http o https',
  },
  PATH: {
    CANNOT_BE_EMPTY: 'La ruta de destino no puede estar vacía',
    TOO_LONG: 'La ruta de destino es demasiado larga',
  },
  HEADERS: {
    RANGE_RESERVED: 'La cabecera Range la gestiona el propio worker',
  },
  OPTIONS: {
    MUST_BE_POSITIVE_INTEGER: 'Debe ser un entero positivo',
    MUST_BE_NON_NEGATIVE_INTEGER: 'Debe ser un entero mayor o igual a 0',
  },
} as const;

export const MAX_TASK_ID_LENGTH = 200;
export const MAX_NAME_LENGTH = 500;
export const MAX_DESCRIPTION_LENGTH = 2000;
export const MAX_PATH_LENGTH = 4096;
