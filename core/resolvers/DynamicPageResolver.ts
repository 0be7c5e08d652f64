/**
 * Resolver para páginas que solo muestran el medio tras ejecutar JavaScript. Usa el
 * colaborador externo de automatización de navegador: abre la página, recoge las URLs de
 * medios capturadas y cierra la sesión en cualquier salida (éxito, error o cancelación).
 *
 * @module resolvers/DynamicPageResolver
 */

import type { MediaKind, MediaVariant } from '../../shared/types';
import { logger } from '../utils';
import { ResolutionError, ResolutionErrorKind, isDownloadManagerError } from '../engines/errors';
import { urlMatchesPlatform } from './platforms';
import { rankVariants } from './variantSelection';
import type {
  BrowserAutomation,
  BrowserSession,
  CapturedMedia,
  IResolver,
  PlatformDefinition,
  PlaylistEntry,
} from './types';

const log = logger.child('DynamicPageResolver');

function kindFromMime(mimeType: string | null, fallback: MediaKind): MediaKind {
  if (!mimeType) return fallback;
  if (mimeType.startsWith('image/')) return 'photo';
  if (mimeType.startsWith('audio/')) return 'audio';
  if (mimeType.startsWith('video/')) return 'video';
  return fallback;
}

function containerOf(media: CapturedMedia): string {
  const subtype = media.mimeType?.split('/')[1]?.split(';')[0]?.trim();
  if (subtype) return subtype === 'jpeg' ? 'jpg' : subtype;
  try {
    const ext = new URL(media.url).pathname.split('.').pop();
    return ext && ext.length <= 5 ? ext.toLowerCase() : 'bin';
  } catch {
    return 'bin';
  }
}

export class DynamicPageResolver implements IResolver {
  readonly name: string;
  private readonly platform: PlatformDefinition;
  private readonly automation: BrowserAutomation;

  constructor(platform: PlatformDefinition, automation: BrowserAutomation) {
    this.name = `${platform.name} (navegador)`;
    this.platform = platform;
    this.automation = automation;
  }

  canHandle(url: string): boolean {
    return urlMatchesPlatform(url, this.platform);
  }

  async resolve(url: string, signal?: AbortSignal): Promise<MediaVariant[]> {
    if (signal?.aborted) throw new ResolutionError(ResolutionErrorKind.CANCELLED);

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let session: BrowserSession | null = null;
    try {
      session = await this.automation.newSession();
      await session.open(url, controller.signal);
      if (controller.signal.aborted) throw new ResolutionError(ResolutionErrorKind.CANCELLED);

      const [captured, title, cookies] = await Promise.all([
        session.collectMedia(),
        session.title(),
        session.cookies(),
      ]);
      if (controller.signal.aborted) throw new ResolutionError(ResolutionErrorKind.CANCELLED);

      const variants = captured.map((media, index): MediaVariant => {
        const mediaKind = kindFromMime(media.mimeType, this.platform.defaultMediaKind);
        return {
          sourceUrl: url,
          formatId: `page-${index}`,
          container: containerOf(media),
          resolutionLabel: media.height ? `${media.height}p` : mediaKind === 'audio' ? 'audio' : 'original',
          estimatedSizeBytes: media.sizeBytes ?? null,
          fetchDescriptor: {
            url: media.url,
            headers: { Referer: url, ...(media.headers ?? {}) },
            ...(cookies ? { cookies } : {}),
          },
          mediaKind,
          ...(title ? { title } : {}),
          ...(media.width ? { width: media.width } : {}),
          ...(media.height ? { height: media.height } : {}),
        };
      });

      if (variants.length === 0) {
        throw new ResolutionError(ResolutionErrorKind.PLATFORM_CHANGED, 'La página no expuso ningún medio');
      }
      log.info(`${this.name}: ${variants.length} medios capturados en ${url}`);
      return rankVariants(variants);
    } catch (error) {
      if (controller.signal.aborted) throw new ResolutionError(ResolutionErrorKind.CANCELLED);
      if (isDownloadManagerError(error)) throw error;
      throw new ResolutionError(
        ResolutionErrorKind.NETWORK_ERROR,
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (session) {
        await session.close().catch(closeError => log.warn('Error cerrando la sesión del navegador:', closeError));
      }
    }
  }

  /** Las páginas dinámicas se tratan como un único elemento. */
  async resolvePlaylist(url: string): Promise<PlaylistEntry[]> {
    return [{ url, title: null }];
  }
}

export default DynamicPageResolver;
