/**
 * Resolver de una plataforma concreta: coincide por dominio y delega la extracción en un
 * ExtractionBackend (yt-dlp). Si se le da un resolver de respaldo (página dinámica), lo usa
 * cuando el backend no reconoce el formato de la plataforma.
 *
 * @module resolvers/PlatformResolver
 */

import type { MediaVariant } from '../../shared/types';
import { logger } from '../utils';
import { ResolutionError, ResolutionErrorKind } from '../engines/errors';
import { urlMatchesPlatform } from './platforms';
import { variantsFromInfo } from './variantSelection';
import type { ExtractionBackend, IResolver, PlatformDefinition, PlaylistEntry } from './types';

const log = logger.child('PlatformResolver');

export class PlatformResolver implements IResolver {
  readonly name: string;
  private readonly platform: PlatformDefinition;
  private readonly backend: ExtractionBackend;
  private readonly fallback: IResolver | null;

  constructor(platform: PlatformDefinition, backend: ExtractionBackend, fallback: IResolver | null = null) {
    this.name = platform.name;
    this.platform = platform;
    this.backend = backend;
    this.fallback = fallback;
  }

  canHandle(url: string): boolean {
    return urlMatchesPlatform(url, this.platform);
  }

  async resolve(url: string, signal?: AbortSignal): Promise<MediaVariant[]> {
    try {
      const info = await this.backend.extract(url, signal);
      const variants = variantsFromInfo(info, url, this.platform.defaultMediaKind);
      if (variants.length === 0) {
        throw new ResolutionError(ResolutionErrorKind.PLATFORM_CHANGED, 'Sin formatos descargables');
      }
      log.info(`${this.name}: ${variants.length} variantes para ${url}`);
      return variants;
    } catch (error) {
      if (
        this.fallback &&
        error instanceof ResolutionError &&
        error.kind === ResolutionErrorKind.PLATFORM_CHANGED &&
        !signal?.aborted
      ) {
        log.info(`${this.name}: extractor sin resultado, se prueba ${this.fallback.name}`);
        return this.fallback.resolve(url, signal);
      }
      throw error;
    }
  }

  /** Entradas de una playlist (o la propia URL si no es una playlist). */
  async resolvePlaylist(url: string, maxEntries: number, signal?: AbortSignal): Promise<PlaylistEntry[]> {
    const info = await this.backend.extractPlaylist(url, maxEntries, signal);
    if (info._type !== 'playlist' || !info.entries) {
      return [{ url: info.webpage_url ?? url, title: info.title ?? null }];
    }
    const entries: PlaylistEntry[] = [];
    for (const entry of info.entries) {
      const entryUrl = entry?.webpage_url ?? entry?.url;
      if (!entry || !entryUrl) continue;
      entries.push({ url: entryUrl, title: entry.title ?? null });
      if (entries.length >= maxEntries) break;
    }
    log.info(`${this.name}: playlist con ${entries.length} entradas (${url})`);
    return entries;
  }
}

export default PlatformResolver;
