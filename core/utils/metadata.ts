/**
 * @fileoverview Archivo sidecar de metadatos (`<archivo>.json`) junto a una descarga completada.
 * @module utils/metadata
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { logger } from './logger';

const log = logger.child('Metadata');

export const mediaMetadataSchema = z.object({
  sourceUrl: z.string(),
  title: z.string().nullable(),
  formatId: z.string(),
  container: z.string(),
  resolutionLabel: z.string(),
  mediaKind: z.enum(['video', 'audio', 'photo']),
  bytesTotal: z.number().nullable(),
  downloadedAt: z.number(),
});

export type MediaMetadata = z.infer<typeof mediaMetadataSchema>;

export function getMetadataPath(filePath: string): string {
  return `${filePath}.json`;
}

/** Escribe el sidecar vía archivo temporal + rename. Devuelve la ruta escrita. */
export async function saveMetadata(filePath: string, metadata: MediaMetadata): Promise<string> {
  const target = getMetadataPath(filePath);
  const tmp = `${target}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(metadata, null, 2), 'utf-8');
  await fs.rename(tmp, target);
  log.debug(`Metadatos guardados: ${target}`);
  return target;
}

/** Lee el sidecar; null si no existe o no es válido. */
export async function loadMetadata(filePath: string): Promise<MediaMetadata | null> {
  let raw: string;
  try {
    raw = await fs.readFile(getMetadataPath(filePath), 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') return null;
    throw err;
  }
  try {
    const parsed = mediaMetadataSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    log.warn(`Metadatos inválidos en ${filePath}: ${parsed.error.message}`);
  } catch (error) {
    log.warn(`Metadatos ilegibles en ${filePath}:`, error);
  }
  return null;
}
