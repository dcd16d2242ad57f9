/**
 * @fileoverview Schemas de validación Zod para la entrada de create() y las opciones del registro
 * @module schemas
 */

import { z } from 'zod';
import {
  VALIDATIONS,
  MAX_TASK_ID_LENGTH,
  MAX_NAME_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  MAX_PATH_LENGTH,
} from '../constants/validations';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const httpUrlSchema = z
  .string()
  .url(VALIDATIONS.URL.INVALID)
  .refine(value => {
    try {
      const protocol = new URL(value).protocol;
      return protocol === 'http:' || protocol === 'https:';
    } catch {
      // .url() ya reporta el formato inválido
      return true;
    }
  }, VALIDATIONS.URL.PROTOCOL_NOT_ALLOWED);

const headersSchema = z
  .record(z.string(), z.string())
  .refine(
    headers => !Object.keys(headers).some(name => name.toLowerCase() === 'range'),
    VALIDATIONS.HEADERS.RANGE_RESERVED
  );

const createTaskSchema = z.object({
  // El id se guarda tal cual lo eligió el llamador
  id: z
    .string()
    .max(MAX_TASK_ID_LENGTH, VALIDATIONS.TASK.ID_TOO_LONG)
    .refine(value => value.trim().length > 0, VALIDATIONS.TASK.ID_CANNOT_BE_EMPTY),
  name: z
    .string()
    .trim()
    .min(1, VALIDATIONS.TASK.NAME_CANNOT_BE_EMPTY)
    .max(MAX_NAME_LENGTH, VALIDATIONS.TASK.NAME_TOO_LONG),
  url: httpUrlSchema,
  destination: z
    .string()
    .min(1, VALIDATIONS.PATH.CANNOT_BE_EMPTY)
    .max(MAX_PATH_LENGTH, VALIDATIONS.PATH.TOO_LONG),
  description: z.string().max(MAX_DESCRIPTION_LENGTH, VALIDATIONS.TASK.DESCRIPTION_TOO_LONG),
  headers: headersSchema,
});

const positiveInt = z.number().int().positive(VALIDATIONS.OPTIONS.MUST_BE_POSITIVE_INTEGER);
const nonNegativeInt = z.number().int().min(0, VALIDATIONS.OPTIONS.MUST_BE_NON_NEGATIVE_INTEGER);

const registrySettingsSchema = z.object({
  maxRetries: nonNegativeInt.optional(),
  retryDelayMs: nonNegativeInt.optional(),
  maxRetryDelayMs: nonNegativeInt.optional(),
  retryBackoff: z.enum(['fixed', 'exponential']).optional(),
  failFastOnClientError: z.boolean().optional(),
  chunkSize: positiveInt.optional(),
  progressIntervalMs: nonNegativeInt.optional(),
  speedWindowMs: positiveInt.optional(),
  requestTimeoutMs: positiveInt.optional(),
});

export type CreateTaskParams = z.infer<typeof createTaskSchema>;
export type RegistrySettings = z.infer<typeof registrySettingsSchema>;

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ZodValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errorMessages = result.error.issues.map((issue: z.ZodIssue) => {
    const pathStr = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${pathStr}${issue.message}`;
  });
  return { success: false, error: errorMessages.join('; ') };
}

export function validateCreateTask(params: unknown): ZodValidationResult<CreateTaskParams> {
  return validate(createTaskSchema, params);
}

export function validateRegistrySettings(params: unknown): ZodValidationResult<RegistrySettings> {
  return validate(registrySettingsSchema, params);
}

export const schemas = {
  createTask: createTaskSchema,
  registrySettings: registrySettingsSchema,
};
