/**
 * Resolver Adapter: registro por dominio, resolvers de plataforma, backend yt-dlp,
 * resolver de página dinámica y selección de variantes.
 *
 * @module resolvers
 */

export { ResolverRegistry, createDefaultRegistry } from './ResolverRegistry';
export type { DefaultRegistryOptions } from './ResolverRegistry';
export { PlatformResolver } from './PlatformResolver';
export { DynamicPageResolver } from './DynamicPageResolver';
export { YtDlpBackend, classifyExtractorError } from './YtDlpBackend';
export type { YtDlpBackendOptions } from './YtDlpBackend';
export { PLATFORMS, matchesDomain, hostnameOf, urlMatchesPlatform } from './platforms';
export {
  variantsFromInfo,
  rankVariants,
  compareVariantQuality,
  selectVariant,
  selectorFromPreferences,
} from './variantSelection';
export type * from './types';
