/**
 * Tests unitarios para el registro de resolvers, la coincidencia de dominios y los
 * resolvers por plataforma (con backend y navegador simulados).
 */
import { ResolutionError, ResolutionErrorKind } from '../../core/engines/errors';
import { DynamicPageResolver } from '../../core/resolvers/DynamicPageResolver';
import { PlatformResolver } from '../../core/resolvers/PlatformResolver';
import { ResolverRegistry, createDefaultRegistry } from '../../core/resolvers/ResolverRegistry';
import { PLATFORMS, hostnameOf, matchesDomain } from '../../core/resolvers/platforms';
import type {
  BrowserAutomation,
  BrowserSession,
  CapturedMedia,
  ExtractionBackend,
  PlatformDefinition,
} from '../../core/resolvers/types';
import type { ExtractorInfo } from '../../core/utils/schemas';

const YOUTUBE: PlatformDefinition = { name: 'YouTube', domains: ['*.youtube.com', 'youtu.be'], defaultMediaKind: 'video' };
const PINTEREST: PlatformDefinition = { name: 'Pinterest', domains: ['*.pinterest.com', 'pin.it'], defaultMediaKind: 'photo' };

const VIDEO_INFO: ExtractorInfo = {
  id: 'abc',
  title: 'Clip',
  formats: [
    { format_id: '18', url: 'https://cdn.example.test/360.mp4', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a', height: 360 },
  ],
};

function fakeBackend(overrides: Partial<ExtractionBackend> = {}) {
  return {
    extract: jest.fn<Promise<ExtractorInfo>, [string, AbortSignal?]>(overrides.extract ?? (async () => VIDEO_INFO)),
    extractPlaylist: jest.fn<Promise<ExtractorInfo>, [string, number, AbortSignal?]>(
      overrides.extractPlaylist ?? (async () => VIDEO_INFO)
    ),
  };
}

class FakeSession implements BrowserSession {
  opened: string[] = [];
  closeCalls = 0;

  constructor(
    private readonly media: CapturedMedia[],
    private readonly openError: Error | null = null
  ) {}

  async open(url: string): Promise<void> {
    this.opened.push(url);
    if (this.openError) throw this.openError;
  }

  async collectMedia(): Promise<CapturedMedia[]> {
    return this.media;
  }

  async title(): Promise<string | null> {
    return 'Pin de prueba';
  }

  async cookies(): Promise<string | null> {
    return 'csrftoken=test';
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

function fakeAutomation(session: FakeSession): BrowserAutomation {
  return { newSession: async () => session };
}

const PIN_URL = 'https://www.pinterest.com/pin/123/';
const PIN_MEDIA: CapturedMedia = {
  url: 'https://i.pinimg.example.test/originals/a.jpg',
  mimeType: 'image/jpeg',
  width: 1000,
  height: 1500,
};

describe('platforms', () => {
  it('debe coincidir "*.dominio" con la raíz y los subdominios', () => {
    expect(matchesDomain('www.youtube.com', '*.youtube.com')).toBe(true);
    expect(matchesDomain('youtube.com', '*.youtube.com')).toBe(true);
    expect(matchesDomain('notyoutube.com', '*.youtube.com')).toBe(false);
  });

  it('debe exigir coincidencia exacta sin comodín', () => {
    expect(matchesDomain('youtu.be', 'youtu.be')).toBe(true);
    expect(matchesDomain('m.youtu.be', 'youtu.be')).toBe(false);
  });

  it('debe aceptar solo URLs http/https', () => {
    expect(hostnameOf('https://www.tiktok.com/@user/video/1')).toBe('www.tiktok.com');
    expect(hostnameOf('ftp://www.tiktok.com/x')).toBeNull();
    expect(hostnameOf('no es una url')).toBeNull();
  });

  it('debe declarar las cinco plataformas soportadas', () => {
    expect(PLATFORMS.map(p => p.name)).toEqual(['YouTube', 'TikTok', 'Pinterest', 'Facebook', 'Instagram']);
  });
});

describe('ResolverRegistry', () => {
  it('debe elegir el resolver por dominio', () => {
    const registry = createDefaultRegistry({ backend: fakeBackend() });
    expect(registry.size).toBe(5);
    expect(registry.resolverFor('https://vm.tiktok.com/x')?.name).toBe('TikTok');
    expect(registry.resolverFor('https://fb.watch/abc')?.name).toBe('Facebook');
    expect(registry.canHandle('https://example.test/video')).toBe(false);
  });

  it('debe rechazar con NOT_SUPPORTED una URL sin resolver', async () => {
    const registry = createDefaultRegistry({ backend: fakeBackend() });
    await expect(registry.resolve('https://example.test/video')).rejects.toMatchObject({
      kind: ResolutionErrorKind.NOT_SUPPORTED,
    });
  });

  it('debe devolver las variantes del backend', async () => {
    const backend = fakeBackend();
    const registry = createDefaultRegistry({ backend });
    const variants = await registry.resolve('https://youtu.be/abc');
    expect(variants.map(v => v.formatId)).toEqual(['18']);
    expect(backend.extract).toHaveBeenCalledWith('https://youtu.be/abc', undefined);
  });

  it('debe convertir errores desconocidos en NETWORK_ERROR', async () => {
    const registry = createDefaultRegistry({
      backend: fakeBackend({
        extract: async () => {
          throw new Error('boom');
        },
      }),
    });
    const error = await registry.resolve('https://youtu.be/abc').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({
      kind: ResolutionErrorKind.NETWORK_ERROR,
      message: 'Error de red al consultar la plataforma: boom',
    });
  });

  it('debe devolver CANCELLED si la señal ya estaba abortada cuando falla', async () => {
    const controller = new AbortController();
    controller.abort();
    const registry = new ResolverRegistry().register({
      name: 'Falso',
      canHandle: () => true,
      resolve: async () => {
        throw new Error('abortado');
      },
      resolvePlaylist: async () => [],
    });
    await expect(registry.resolve('https://x.example.test', controller.signal)).rejects.toMatchObject({
      kind: ResolutionErrorKind.CANCELLED,
    });
  });

  it('debe usar el navegador como respaldo cuando el extractor no encuentra formatos', async () => {
    const session = new FakeSession([PIN_MEDIA]);
    const registry = createDefaultRegistry({
      backend: fakeBackend({ extract: async () => ({ title: 'vacío', formats: [] }) }),
      browserAutomation: fakeAutomation(session),
    });
    const variants = await registry.resolve(PIN_URL);
    expect(variants.map(v => v.formatId)).toEqual(['page-0']);
    expect(session.opened).toEqual([PIN_URL]);
    expect(session.closeCalls).toBe(1);
  });
});

describe('PlatformResolver', () => {
  it('debe propagar PLATFORM_CHANGED sin respaldo', async () => {
    const resolver = new PlatformResolver(
      YOUTUBE,
      fakeBackend({ extract: async () => ({ title: 'vacío' }) })
    );
    await expect(resolver.resolve('https://youtu.be/abc')).rejects.toMatchObject({
      kind: ResolutionErrorKind.PLATFORM_CHANGED,
    });
  });

  it('no debe usar el respaldo con otros errores', async () => {
    const session = new FakeSession([PIN_MEDIA]);
    const resolver = new PlatformResolver(
      PINTEREST,
      fakeBackend({
        extract: async () => {
          throw new ResolutionError(ResolutionErrorKind.PRIVATE_OR_REMOVED);
        },
      }),
      new DynamicPageResolver(PINTEREST, fakeAutomation(session))
    );
    await expect(resolver.resolve(PIN_URL)).rejects.toMatchObject({
      kind: ResolutionErrorKind.PRIVATE_OR_REMOVED,
    });
    expect(session.opened).toEqual([]);
  });

  it('debe listar las entradas de una playlist hasta el máximo', async () => {
    const backend = fakeBackend({
      extractPlaylist: async () => ({
        _type: 'playlist',
        title: 'Lista',
        entries: [
          { url: 'https://www.youtube.com/watch?v=1', title: 'uno' },
          null,
          { webpage_url: 'https://www.youtube.com/watch?v=2' },
          { url: 'https://www.youtube.com/watch?v=3' },
        ],
      }),
    });
    const resolver = new PlatformResolver(YOUTUBE, backend);
    const entries = await resolver.resolvePlaylist('https://www.youtube.com/playlist?list=PL1', 2);
    expect(entries).toEqual([
      { url: 'https://www.youtube.com/watch?v=1', title: 'uno' },
      { url: 'https://www.youtube.com/watch?v=2', title: null },
    ]);
    expect(backend.extractPlaylist).toHaveBeenCalledWith('https://www.youtube.com/playlist?list=PL1', 2, undefined);
  });

  it('debe tratar una URL suelta como playlist de una entrada', async () => {
    const resolver = new PlatformResolver(
      YOUTUBE,
      fakeBackend({
        extractPlaylist: async () => ({ title: 'Clip', webpage_url: 'https://www.youtube.com/watch?v=abc' }),
      })
    );
    expect(await resolver.resolvePlaylist('https://youtu.be/abc', 10)).toEqual([
      { url: 'https://www.youtube.com/watch?v=abc', title: 'Clip' },
    ]);
  });
});

describe('DynamicPageResolver', () => {
  it('debe construir variantes desde los medios capturados', async () => {
    const session = new FakeSession([PIN_MEDIA]);
    const resolver = new DynamicPageResolver(PINTEREST, fakeAutomation(session));
    expect(resolver.name).toBe('Pinterest (navegador)');
    expect(await resolver.resolve(PIN_URL)).toEqual([
      {
        sourceUrl: PIN_URL,
        formatId: 'page-0',
        container: 'jpg',
        resolutionLabel: '1500p',
        estimatedSizeBytes: null,
        fetchDescriptor: {
          url: PIN_MEDIA.url,
          headers: { Referer: PIN_URL },
          cookies: 'csrftoken=test',
        },
        mediaKind: 'photo',
        title: 'Pin de prueba',
        width: 1000,
        height: 1500,
      },
    ]);
  });

  it('debe deducir el contenedor de la extensión si no hay MIME', async () => {
    const session = new FakeSession([
      { url: 'https://video.example.test/clip.MP4?x=1', mimeType: null, sizeBytes: 2048 },
    ]);
    const resolver = new DynamicPageResolver(PINTEREST, fakeAutomation(session));
    const [variant] = await resolver.resolve(PIN_URL);
    expect(variant.container).toBe('mp4');
    expect(variant.mediaKind).toBe('photo');
    expect(variant.resolutionLabel).toBe('original');
    expect(variant.estimatedSizeBytes).toBe(2048);
  });

  it('debe fallar con PLATFORM_CHANGED si la página no expone medios y cerrar la sesión', async () => {
    const session = new FakeSession([]);
    const resolver = new DynamicPageResolver(PINTEREST, fakeAutomation(session));
    await expect(resolver.resolve(PIN_URL)).rejects.toMatchObject({
      kind: ResolutionErrorKind.PLATFORM_CHANGED,
    });
    expect(session.closeCalls).toBe(1);
  });

  it('debe envolver errores del navegador como NETWORK_ERROR', async () => {
    const session = new FakeSession([], new Error('net::ERR_NAME_NOT_RESOLVED'));
    const resolver = new DynamicPageResolver(PINTEREST, fakeAutomation(session));
    await expect(resolver.resolve(PIN_URL)).rejects.toMatchObject({
      kind: ResolutionErrorKind.NETWORK_ERROR,
      detail: 'net::ERR_NAME_NOT_RESOLVED',
    });
    expect(session.closeCalls).toBe(1);
  });

  it('debe rechazar con CANCELLED si la señal ya está abortada', async () => {
    const session = new FakeSession([PIN_MEDIA]);
    const resolver = new DynamicPageResolver(PINTEREST, fakeAutomation(session));
    const controller = new AbortController();
    controller.abort();
    await expect(resolver.resolve(PIN_URL, controller.signal)).rejects.toMatchObject({
      kind: ResolutionErrorKind.CANCELLED,
    });
    expect(session.opened).toEqual([]);
  });
});
