/**
 * Tests unitarios para src/errors.ts
 */
import { runInNewContext } from 'vm';
import {
  CallbackError,
  DuplicateTaskError,
  InvalidTransitionError,
  NotFoundError,
  TransferError,
  TransferManagerError,
  ValidationError,
  errorMessage,
} from '../../src/errors';
import { ERRORS } from '../../src/constants/errors';

describe('errors', () => {
  it('los errores de uso deben llevar código, nombre y contexto', () => {
    const duplicate = new DuplicateTaskError('a');
    expect(duplicate).toBeInstanceOf(TransferManagerError);
    expect(duplicate.name).toBe('DuplicateTaskError');
    expect(duplicate.code).toBe('DUPLICATE_TASK');
    expect(duplicate.message).toBe(`${ERRORS.TASK.DUPLICATE}: a`);
    expect(duplicate.context).toBe('a');

    const notFound = new NotFoundError('b');
    expect(notFound.code).toBe('TASK_NOT_FOUND');
    expect(notFound.message).toBe(`${ERRORS.TASK.NOT_FOUND}: b`);
  });

  it('ValidationError debe anteponer el texto general', () => {
    const error = new ValidationError('id: vacío');
    expect(error.message).toBe('Parámetros inválidos: id: vacío');
    expect(error.code).toBe('VALIDATION_FAILED');
  });

  it('InvalidTransitionError debe describir la transición', () => {
    const error = new InvalidTransitionError('a', 'completed', 'running');
    expect(error.message).toBe(`${ERRORS.TASK.INVALID_TRANSITION}: completed -> running`);
    expect(error.from).toBe('completed');
    expect(error.to).toBe('running');
  });

  it('TransferError debe ser reintentable por defecto', () => {
    const cause = new Error('ECONNRESET');
    const error = new TransferError('Error de red: ECONNRESET', { cause });
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
    expect(error.statusCode).toBeUndefined();

    const definitive = new TransferError('HTTP 404', { statusCode: 404, retryable: false });
    expect(definitive.retryable).toBe(false);
    expect(definitive.statusCode).toBe(404);
  });

  it('CallbackError debe incluir tarea, evento y causa', () => {
    const error = new CallbackError('Error en callback de tarea', 'a', 'progress', new Error('boom'));
    expect(error.message).toBe('Error en callback de tarea (a/progress): boom');
    expect(error.code).toBe('CALLBACK_FAILED');
  });

  it('errorMessage debe aceptar cualquier valor lanzado', () => {
    expect(errorMessage(new Error('disco lleno'))).toBe('disco lleno');
    expect(errorMessage('texto')).toBe('texto');
    expect(errorMessage(42)).toBe(ERRORS.GENERAL.UNKNOWN);
    expect(errorMessage(new Error(''))).toBe(ERRORS.GENERAL.UNKNOWN);
  });

  it('errorMessage debe leer el mensaje de un error de otro contexto', () => {
    const foreign: unknown = runInNewContext('new Error("permiso denegado")');
    expect(errorMessage(foreign)).toBe('permiso denegado');
  });
});
