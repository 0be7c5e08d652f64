/**
 * @fileoverview Utilidades para operaciones con archivos y sanitización de nombres
 * @module fileHelpers
 */

import fs from 'fs';
import { promises as fsPromises } from 'fs';
import path from 'path';
import { COLLISION_SUFFIX_RESERVE_BYTES, MAX_FILENAME_BYTES } from '../constants/validations';
import { logger } from './logger';

const log = logger.child('FileUtils');

export function sanitizeFilename(filename: string): string {
  if (!filename || typeof filename !== 'string') return 'unnamed';

  let sanitized = filename
    .replace(/[<>:"|?*]/g, '_')
    .replace(/\\/g, '_')
    .replace(/\//g, '_')
    // Caracteres de control y DEL intencionados para sanitizar
    /* eslint-disable-next-line no-control-regex */
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .trim();

  const reservedNames = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])(\..*)?$/i;
  if (reservedNames.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  sanitized = truncateToBytes(sanitized, MAX_FILENAME_BYTES);

  if (!sanitized || sanitized === '.' || sanitized === '..') {
    sanitized = 'unnamed';
  }

  return sanitized;
}

/** Recorta value a maxBytes en UTF-8 sin partir un carácter. */
export function truncateToBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, 'utf8') <= maxBytes) return value;
  let result = '';
  let used = 0;
  for (const char of Array.from(value)) {
    const size = Buffer.byteLength(char, 'utf8');
    if (used + size > maxBytes) break;
    result += char;
    used += size;
  }
  return result;
}

/**
 * Bytes disponibles para el nombre final, descontando el sufijo de staging y el hueco
 * para " (n)".
 */
export function fileNameBudget(stagingSuffix: string): number {
  return MAX_FILENAME_BYTES - Buffer.byteLength(stagingSuffix, 'utf8') - COLLISION_SUFFIX_RESERVE_BYTES;
}

/** Ajusta fileName a maxBytes recortando la base y conservando la extensión. */
export function fitFileName(fileName: string, maxBytes: number): string {
  if (Buffer.byteLength(fileName, 'utf8') <= maxBytes) return fileName;
  const parsed = path.parse(fileName);
  const extBytes = Buffer.byteLength(parsed.ext, 'utf8');
  if (!parsed.name || extBytes >= maxBytes) return truncateToBytes(fileName, maxBytes);
  const base = truncateToBytes(parsed.name, maxBytes - extBytes).trimEnd();
  return `${base || '_'}${parsed.ext}`;
}

/**
 * Nombre de archivo final para una variante: título (o "media-<formatId>") más la extensión
 * del contenedor, dentro de maxBytes. La extensión se conserva aunque el título se recorte.
 */
export function buildMediaFileName(
  title: string | undefined,
  formatId: string,
  container: string,
  maxBytes: number = MAX_FILENAME_BYTES
): string {
  const ext = sanitizeFilename(container.replace(/^\.+/, '')).toLowerCase();
  const base = title?.trim() ? title.trim() : `media-${formatId}`;
  const safeBase = sanitizeFilename(base);
  return fitFileName(ext ? `${safeBase}.${ext}` : safeBase, maxBytes);
}

/**
 * Devuelve una ruta libre dentro de dir para fileName. Si el nombre está ocupado (isTaken),
 * prueba "nombre (1).ext", "nombre (2).ext"… en ese orden; nunca sobrescribe.
 */
export function resolveUniqueDestination(
  dir: string,
  fileName: string,
  isTaken: (_candidate: string) => boolean
): string {
  const parsed = path.parse(fileName);
  let candidate = path.join(dir, fileName);
  let counter = 1;
  while (isTaken(candidate)) {
    candidate = path.join(dir, `${parsed.name} (${counter})${parsed.ext}`);
    counter++;
  }
  return candidate;
}

export interface DirectoryCheckResult {
  writable: boolean;
  error?: string;
}

/** Crea el directorio si no existe y comprueba permiso de escritura (síncrono, se usa en la admisión). */
export function checkDirectoryWritable(dirPath: string): DirectoryCheckResult {
  try {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
    const stats = fs.statSync(dirPath);
    if (!stats.isDirectory()) {
      return { writable: false, error: `${dirPath} no es un directorio` };
    }
    fs.accessSync(dirPath, fs.constants.W_OK);
    return { writable: true };
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    log.debug('Sin permisos de escritura en:', dirPath, err.message);
    return { writable: false, error: err.code ? `${err.code}: ${err.message}` : err.message };
  }
}

/** Elimina un archivo si existe. Devuelve true si se eliminó algo. */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.unlink(filePath);
    return true;
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') return false;
    throw err;
  }
}

/** Tamaño en bytes del archivo, o null si no existe. */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fsPromises.stat(filePath);
    return stats.size;
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Espacio libre (bytes) en el sistema de archivos que contiene filePath, o null si no se puede
 * consultar. Sube hasta el primer directorio existente.
 */
export async function getAvailableDiskSpace(filePath: string): Promise<number | null> {
  let dirToCheck = path.dirname(path.resolve(filePath));
  const root = path.parse(dirToCheck).root;
  while (dirToCheck !== root && !fs.existsSync(dirToCheck)) {
    dirToCheck = path.dirname(dirToCheck);
  }
  try {
    const stats = await fsPromises.statfs(dirToCheck);
    return stats.bsize * stats.bavail;
  } catch (error) {
    log.debug('statfs falló:', error instanceof Error ? error.message : String(error));
    return null;
  }
}

export function formatBytes(bytes: number | null | undefined): string {
  if (bytes == null || !Number.isFinite(bytes)) return 'N/A';
  if (bytes <= 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
}
