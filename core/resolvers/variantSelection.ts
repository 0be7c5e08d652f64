/**
 * Conversión del JSON del extractor a MediaVariant y elección de variante según selector.
 *
 * @module resolvers/variantSelection
 */

import type { MediaKind, MediaVariant } from '../../shared/types';
import type { ExtractorFormat, ExtractorInfo, VariantSelector } from '../utils/schemas';
import { logger } from '../utils';

const log = logger.child('VariantSelection');

const PHOTO_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp', 'gif'];

function hasCodec(codec: string | null | undefined): boolean {
  return codec != null && codec !== 'none';
}

function positiveOrUndefined(value: number | null | undefined): number | undefined {
  return value != null && value > 0 ? Math.round(value) : undefined;
}

function mediaKindOf(format: ExtractorFormat, fallback: MediaKind): MediaKind {
  const ext = format.ext?.toLowerCase();
  if (ext && PHOTO_EXTENSIONS.includes(ext)) return 'photo';
  if (hasCodec(format.vcodec)) return 'video';
  if (hasCodec(format.acodec)) return 'audio';
  return fallback;
}

function resolutionLabelOf(kind: MediaKind, height: number | undefined, note: string | null | undefined): string {
  if (height) return `${height}p`;
  if (kind === 'audio') return 'audio';
  return note ?? 'unknown';
}

/** Formatos sin URL o sin audio ni vídeo declarados (storyboards) se descartan. */
function isDownloadable(format: ExtractorFormat): boolean {
  if (!format.url) return false;
  return !(format.vcodec === 'none' && format.acodec === 'none');
}

/**
 * Variantes de un JSON de extracción, de mejor a peor (rankVariants).
 */
export function variantsFromInfo(
  info: ExtractorInfo,
  sourceUrl: string,
  defaultKind: MediaKind
): MediaVariant[] {
  const title = info.title?.trim() || undefined;
  const variants: MediaVariant[] = [];

  for (const format of info.formats ?? []) {
    if (!isDownloadable(format) || !format.url) continue;
    const mediaKind = mediaKindOf(format, defaultKind);
    const height = positiveOrUndefined(format.height);
    const width = positiveOrUndefined(format.width);
    const size = format.filesize ?? format.filesize_approx ?? null;
    variants.push({
      sourceUrl,
      formatId: format.format_id,
      container: format.ext ?? 'bin',
      resolutionLabel: resolutionLabelOf(mediaKind, height, format.format_note),
      estimatedSizeBytes: size != null && size >= 0 ? Math.round(size) : null,
      fetchDescriptor: {
        url: format.url,
        headers: { ...(info.http_headers ?? {}), ...(format.http_headers ?? {}) },
        ...(format.cookies ? { cookies: format.cookies } : {}),
      },
      mediaKind,
      ...(title ? { title } : {}),
      ...(width ? { width } : {}),
      ...(height ? { height } : {}),
    });
  }

  if (variants.length === 0 && info.url) {
    const height = positiveOrUndefined(info.height);
    const width = positiveOrUndefined(info.width);
    const ext = info.ext ?? 'bin';
    const mediaKind: MediaKind = PHOTO_EXTENSIONS.includes(ext.toLowerCase()) ? 'photo' : defaultKind;
    variants.push({
      sourceUrl,
      formatId: 'default',
      container: ext,
      resolutionLabel: resolutionLabelOf(mediaKind, height, null),
      estimatedSizeBytes: info.filesize != null ? Math.round(info.filesize) : null,
      fetchDescriptor: { url: info.url, headers: { ...(info.http_headers ?? {}) } },
      mediaKind,
      ...(title ? { title } : {}),
      ...(width ? { width } : {}),
      ...(height ? { height } : {}),
    });
  }

  return rankVariants(variants);
}

/** Orden de calidad: mayor altura, luego mayor tamaño; sin altura al final. Desempate por formatId. */
export function compareVariantQuality(a: MediaVariant, b: MediaVariant): number {
  const ha = a.height ?? -1;
  const hb = b.height ?? -1;
  if (ha !== hb) return hb - ha;
  const sa = a.estimatedSizeBytes ?? -1;
  const sb = b.estimatedSizeBytes ?? -1;
  if (sa !== sb) return sb - sa;
  return a.formatId.localeCompare(b.formatId);
}

export function rankVariants(variants: readonly MediaVariant[]): MediaVariant[] {
  return [...variants].sort(compareVariantQuality);
}

function parseHeightLabel(label: string): number | null {
  const match = /^(\d{2,4})p/i.exec(label.trim());
  return match ? parseInt(match[1], 10) : null;
}

function smallest(variants: readonly MediaVariant[]): MediaVariant {
  return [...variants].sort((a, b) => {
    const sa = a.estimatedSizeBytes ?? Number.MAX_SAFE_INTEGER;
    const sb = b.estimatedSizeBytes ?? Number.MAX_SAFE_INTEGER;
    if (sa !== sb) return sa - sb;
    return (a.height ?? Number.MAX_SAFE_INTEGER) - (b.height ?? Number.MAX_SAFE_INTEGER);
  })[0];
}

function bestWithin(variants: readonly MediaVariant[], maxHeight: number, container?: string): MediaVariant | null {
  const candidates = variants.filter(
    v =>
      v.height != null &&
      v.height <= maxHeight &&
      (!container || v.container.toLowerCase() === container.toLowerCase())
  );
  return candidates.length > 0 ? rankVariants(candidates)[0] : null;
}

/**
 * Elige una variante. Un selector que no coincide con ninguna cae en la mejor disponible
 * (la preferencia no es obligatoria). Devuelve null si no hay variantes.
 */
export function selectVariant(
  variants: readonly MediaVariant[],
  selector: VariantSelector = 'best'
): MediaVariant | null {
  if (variants.length === 0) return null;
  const ranked = rankVariants(variants);
  const best = ranked[0];

  if (selector === 'best') return best;
  if (selector === 'smallest') return smallest(ranked);

  if ('formatId' in selector) {
    const exact = ranked.find(v => v.formatId === selector.formatId);
    if (exact) return exact;
    log.debug(`Formato ${selector.formatId} no disponible, se usa el mejor`);
    return best;
  }

  if ('resolution' in selector) {
    const wanted = selector.resolution.toLowerCase();
    if (wanted === 'best available' || wanted === 'best') return best;
    const exact = ranked.find(v => v.resolutionLabel.toLowerCase() === wanted);
    if (exact) return exact;
    const height = parseHeightLabel(selector.resolution);
    return (height != null ? bestWithin(ranked, height) : null) ?? best;
  }

  return (
    bestWithin(ranked, selector.maxHeight, selector.container) ??
    bestWithin(ranked, selector.maxHeight) ??
    best
  );
}

/**
 * Selector por defecto a partir de los ajustes del usuario: resolución ("Best Available"
 * o "720p") y contenedor preferido ("Best" o una extensión).
 */
export function selectorFromPreferences(resolution: string, extension: string): VariantSelector {
  const height = parseHeightLabel(resolution);
  const container = extension.toLowerCase() === 'best' ? undefined : extension.toLowerCase();
  if (height == null) return 'best';
  return container ? { maxHeight: height, container } : { maxHeight: height };
}
