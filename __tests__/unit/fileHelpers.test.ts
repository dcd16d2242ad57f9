/**
 * Tests unitarios para src/utils/fileHelpers.ts
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { runInNewContext } from 'vm';
import {
  ensureParentDirectory,
  errnoCode,
  getFileSize,
  removeFileIfExists,
  writeJSONFile,
} from '../../src/utils/fileHelpers';

describe('fileHelpers', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ttm-files-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('errnoCode', () => {
    it('debe leer el código de un error creado en otro contexto', () => {
      const foreign: unknown = runInNewContext(
        'Object.assign(new Error("no such file"), { code: "ENOENT" })'
      );
      expect(foreign instanceof Error).toBe(false);
      expect(errnoCode(foreign)).toBe('ENOENT');
    });

    it('debe devolver undefined sin código de texto', () => {
      expect(errnoCode(new Error('x'))).toBeUndefined();
      expect(errnoCode({ code: 13 })).toBeUndefined();
      expect(errnoCode(null)).toBeUndefined();
    });
  });

  describe('getFileSize', () => {
    it('debe devolver el tamaño de un archivo existente', async () => {
      const file = path.join(dir, 'partial.bin');
      fs.writeFileSync(file, Buffer.alloc(4000));
      await expect(getFileSize(file)).resolves.toBe(4000);
    });

    it('debe devolver null si el archivo no existe', async () => {
      await expect(getFileSize(path.join(dir, 'missing.bin'))).resolves.toBeNull();
    });

    it('debe devolver null para un directorio', async () => {
      await expect(getFileSize(dir)).resolves.toBeNull();
    });
  });

  describe('removeFileIfExists', () => {
    it('debe borrar el archivo', async () => {
      const file = path.join(dir, 'partial.bin');
      fs.writeFileSync(file, 'x');
      await expect(removeFileIfExists(file)).resolves.toBe(true);
      expect(fs.existsSync(file)).toBe(false);
    });

    it('debe considerar éxito un archivo inexistente', async () => {
      await expect(removeFileIfExists(path.join(dir, 'missing.bin'))).resolves.toBe(true);
    });
  });

  it('ensureParentDirectory debe crear directorios intermedios', async () => {
    const file = path.join(dir, 'a', 'b', 'file.bin');
    await ensureParentDirectory(file);
    expect(fs.statSync(path.join(dir, 'a', 'b')).isDirectory()).toBe(true);
  });

  it('writeJSONFile debe escribir JSON indentado', async () => {
    const file = path.join(dir, 'out', 'report.json');
    await writeJSONFile(file, { ok: true });
    expect(fs.readFileSync(file, 'utf-8')).toBe('{\n  "ok": true\n}');
  });
});
