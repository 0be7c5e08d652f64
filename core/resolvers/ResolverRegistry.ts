/**
 * Registro de resolvers: elige el primero cuyo patrón de dominio coincide con la URL.
 *
 * resolve() no muta estado compartido: cada llamada va directa al resolver elegido. Los
 * errores que no son ResolutionError se convierten en NETWORK_ERROR.
 *
 * @module resolvers/ResolverRegistry
 */

import type { MediaVariant } from '../../shared/types';
import config from '../config';
import { logger } from '../utils';
import { ResolutionError, ResolutionErrorKind } from '../engines/errors';
import { DynamicPageResolver } from './DynamicPageResolver';
import { PlatformResolver } from './PlatformResolver';
import { PLATFORMS } from './platforms';
import { YtDlpBackend } from './YtDlpBackend';
import type { BrowserAutomation, ExtractionBackend, IResolver, PlaylistEntry } from './types';

const log = logger.child('ResolverRegistry');

/** Plataformas que pueden necesitar renderizar la página si el extractor no basta. */
const DYNAMIC_FALLBACK_PLATFORMS = ['Pinterest', 'Instagram', 'Facebook'];

export class ResolverRegistry {
  private readonly resolvers: IResolver[] = [];

  register(resolver: IResolver): this {
    this.resolvers.push(resolver);
    log.debug(`Resolver registrado: ${resolver.name}`);
    return this;
  }

  get size(): number {
    return this.resolvers.length;
  }

  resolverFor(url: string): IResolver | null {
    return this.resolvers.find(resolver => resolver.canHandle(url)) ?? null;
  }

  canHandle(url: string): boolean {
    return this.resolverFor(url) !== null;
  }

  private requireResolver(url: string): IResolver {
    const resolver = this.resolverFor(url);
    if (!resolver) throw new ResolutionError(ResolutionErrorKind.NOT_SUPPORTED, url);
    return resolver;
  }

  async resolve(url: string, signal?: AbortSignal): Promise<MediaVariant[]> {
    const resolver = this.requireResolver(url);
    try {
      return await resolver.resolve(url, signal);
    } catch (error) {
      throw toResolutionError(error, signal);
    }
  }

  async resolvePlaylist(
    url: string,
    maxEntries: number = config.resolver.playlistMaxEntries,
    signal?: AbortSignal
  ): Promise<PlaylistEntry[]> {
    const resolver = this.requireResolver(url);
    try {
      return await resolver.resolvePlaylist(url, maxEntries, signal);
    } catch (error) {
      throw toResolutionError(error, signal);
    }
  }
}

function toResolutionError(error: unknown, signal?: AbortSignal): ResolutionError {
  if (error instanceof ResolutionError) return error;
  if (signal?.aborted) return new ResolutionError(ResolutionErrorKind.CANCELLED);
  return new ResolutionError(
    ResolutionErrorKind.NETWORK_ERROR,
    error instanceof Error ? error.message : String(error),
    { cause: error }
  );
}

export interface DefaultRegistryOptions {
  backend?: ExtractionBackend;
  browserAutomation?: BrowserAutomation | null;
}

/** Registro con todas las plataformas conocidas sobre yt-dlp (y navegador si se aporta). */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ResolverRegistry {
  const backend = options.backend ?? new YtDlpBackend();
  const registry = new ResolverRegistry();
  for (const platform of PLATFORMS) {
    const fallback =
      options.browserAutomation && DYNAMIC_FALLBACK_PLATFORMS.includes(platform.name)
        ? new DynamicPageResolver(platform, options.browserAutomation)
        : null;
    registry.register(new PlatformResolver(platform, backend, fallback));
  }
  return registry;
}

export default ResolverRegistry;
