/**
 * Plataformas soportadas y coincidencia de dominios.
 *
 * @module resolvers/platforms
 */

import type { PlatformDefinition } from './types';

export const PLATFORMS: readonly PlatformDefinition[] = [
  { name: 'YouTube', domains: ['*.youtube.com', 'youtu.be'], defaultMediaKind: 'video' },
  { name: 'TikTok', domains: ['*.tiktok.com'], defaultMediaKind: 'video' },
  { name: 'Pinterest', domains: ['*.pinterest.com', 'pin.it'], defaultMediaKind: 'photo' },
  { name: 'Facebook', domains: ['*.facebook.com', 'fb.watch'], defaultMediaKind: 'video' },
  { name: 'Instagram', domains: ['*.instagram.com'], defaultMediaKind: 'video' },
];

/** "*.example.com" coincide con example.com y cualquier subdominio; sin "*" solo exacto. */
export function matchesDomain(hostname: string, pattern: string): boolean {
  const host = hostname.toLowerCase().replace(/\.$/, '');
  const pat = pattern.toLowerCase();
  if (pat.startsWith('*.')) {
    const root = pat.slice(2);
    return host === root || host.endsWith(`.${root}`);
  }
  return host === pat;
}

export function hostnameOf(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;
    return parsed.hostname;
  } catch {
    return null;
  }
}

export function urlMatchesPlatform(url: string, platform: PlatformDefinition): boolean {
  const host = hostnameOf(url);
  return host != null && platform.domains.some(pattern => matchesDomain(host, pattern));
}
