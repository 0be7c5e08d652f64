/**
 * Tests unitarios para core/utils/fileHelpers.ts y core/utils/metadata.ts
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  buildMediaFileName,
  checkDirectoryWritable,
  fileNameBudget,
  fitFileName,
  formatBytes,
  getFileSize,
  removeFileIfExists,
  resolveUniqueDestination,
  sanitizeFilename,
  truncateToBytes,
} from '../../core/utils/fileHelpers';
import { getMetadataPath, loadMetadata, saveMetadata, type MediaMetadata } from '../../core/utils/metadata';

describe('fileHelpers', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-dm-files-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('sanitizeFilename', () => {
    it('debe reemplazar caracteres no válidos', () => {
      expect(sanitizeFilename('a<b>:c"d|e?f*g')).toBe('a_b__c_d_e_f_g');
      expect(sanitizeFilename('dir/sub\\file')).toBe('dir_sub_file');
    });

    it('debe quitar caracteres de control', () => {
      expect(sanitizeFilename('a\u0001b')).toBe('ab');
    });

    it('debe proteger nombres reservados', () => {
      expect(sanitizeFilename('CON.txt')).toBe('_CON.txt');
    });

    it('debe devolver "unnamed" para nombres vacíos o de navegación', () => {
      expect(sanitizeFilename('')).toBe('unnamed');
      expect(sanitizeFilename('..')).toBe('unnamed');
    });
  });

  describe('buildMediaFileName', () => {
    it('debe usar el título y la extensión del contenedor', () => {
      expect(buildMediaFileName('Mi vídeo: parte 1', '22', 'MP4')).toBe('Mi vídeo_ parte 1.mp4');
    });

    it('debe usar el formatId si no hay título', () => {
      expect(buildMediaFileName(undefined, '18', 'webm')).toBe('media-18.webm');
      expect(buildMediaFileName('   ', '18', 'webm')).toBe('media-18.webm');
    });

    it('debe conservar la extensión al recortar títulos largos', () => {
      const name = buildMediaFileName('a'.repeat(300), '22', 'mp4');
      expect(name).toBe(`${'a'.repeat(251)}.mp4`);
      expect(name.length).toBe(255);
    });

    it('debe dejar sitio al sufijo de staging y a " (n)" dentro de 255 bytes', () => {
      expect(fileNameBudget('.part')).toBe(242);
      const name = buildMediaFileName('a'.repeat(300), '22', 'mp4', fileNameBudget('.part'));
      expect(name).toBe(`${'a'.repeat(238)}.mp4`);
      expect(Buffer.byteLength(`${name.slice(0, -4)} (12).mp4.part`)).toBeLessThanOrEqual(255);
    });

    it('debe medir los títulos CJK en bytes UTF-8', () => {
      const name = buildMediaFileName('漢'.repeat(90), '22', 'mp4', fileNameBudget('.part'));
      expect(name).toBe(`${'漢'.repeat(79)}.mp4`);
      expect(Buffer.byteLength(name)).toBe(241);
    });
  });

  describe('truncateToBytes', () => {
    it('debe cortar sin partir caracteres multibyte', () => {
      expect(truncateToBytes('ñandú', 3)).toBe('ña');
      expect(truncateToBytes('😀😀', 5)).toBe('😀');
      expect(truncateToBytes('corto', 10)).toBe('corto');
    });

    it('debe limitar sanitizeFilename a 255 bytes', () => {
      expect(sanitizeFilename('é'.repeat(200))).toBe('é'.repeat(127));
    });
  });

  describe('fitFileName', () => {
    it('debe conservar la extensión de un nombre propio largo', () => {
      expect(fitFileName(`${'b'.repeat(20)}.webm`, 10)).toBe('bbbbb.webm');
      expect(fitFileName('propio.mp4', 242)).toBe('propio.mp4');
    });
  });

  describe('resolveUniqueDestination', () => {
    it('debe devolver el nombre tal cual si está libre', () => {
      expect(resolveUniqueDestination('/descargas', 'clip.mp4', () => false)).toBe(
        path.join('/descargas', 'clip.mp4')
      );
    });

    it('debe añadir "(n)" hasta encontrar un nombre libre', () => {
      const taken = new Set([path.join('/descargas', 'clip.mp4'), path.join('/descargas', 'clip (1).mp4')]);
      expect(resolveUniqueDestination('/descargas', 'clip.mp4', c => taken.has(c))).toBe(
        path.join('/descargas', 'clip (2).mp4')
      );
    });
  });

  describe('checkDirectoryWritable', () => {
    it('debe crear el directorio si no existe', () => {
      const dir = path.join(tmpDir, 'a', 'b');
      expect(checkDirectoryWritable(dir)).toEqual({ writable: true });
      expect(fs.statSync(dir).isDirectory()).toBe(true);
    });

    it('debe rechazar una ruta que es un archivo', () => {
      const file = path.join(tmpDir, 'archivo.txt');
      fs.writeFileSync(file, 'x');
      expect(checkDirectoryWritable(file)).toEqual({ writable: false, error: `${file} no es un directorio` });
    });
  });

  describe('removeFileIfExists / getFileSize', () => {
    it('debe informar tamaño y borrar una sola vez', async () => {
      const file = path.join(tmpDir, 'parcial.part');
      fs.writeFileSync(file, 'hola!');
      expect(await getFileSize(file)).toBe(5);
      expect(await removeFileIfExists(file)).toBe(true);
      expect(await removeFileIfExists(file)).toBe(false);
      expect(await getFileSize(file)).toBeNull();
    });
  });

  describe('formatBytes', () => {
    it('debe formatear tamaños legibles', () => {
      expect(formatBytes(null)).toBe('N/A');
      expect(formatBytes(0)).toBe('0 Bytes');
      expect(formatBytes(11)).toBe('11 Bytes');
      expect(formatBytes(1536)).toBe('1.5 KB');
      expect(formatBytes(1048576)).toBe('1 MB');
    });
  });

  describe('metadata', () => {
    const metadata: MediaMetadata = {
      sourceUrl: 'https://youtu.be/abc',
      title: 'Clip',
      formatId: '22',
      container: 'mp4',
      resolutionLabel: '720p',
      mediaKind: 'video',
      bytesTotal: 2048,
      downloadedAt: 1700000000000,
    };

    it('debe escribir el sidecar junto al archivo y leerlo de vuelta', async () => {
      const file = path.join(tmpDir, 'Clip.mp4');
      const written = await saveMetadata(file, metadata);
      expect(written).toBe(`${file}.json`);
      expect(getMetadataPath(file)).toBe(written);
      expect(fs.existsSync(`${written}.tmp`)).toBe(false);
      expect(await loadMetadata(file)).toEqual(metadata);
    });

    it('debe devolver null si no existe o no es válido', async () => {
      const file = path.join(tmpDir, 'Otro.mp4');
      expect(await loadMetadata(file)).toBeNull();
      fs.writeFileSync(getMetadataPath(file), '{roto');
      expect(await loadMetadata(file)).toBeNull();
      fs.writeFileSync(getMetadataPath(file), JSON.stringify({ sourceUrl: 'x' }));
      expect(await loadMetadata(file)).toBeNull();
    });
  });
});
