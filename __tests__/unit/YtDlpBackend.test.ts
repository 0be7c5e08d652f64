/**
 * Tests unitarios para core/resolvers/YtDlpBackend.ts con un proceso hijo simulado.
 */
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ResolutionErrorKind } from '../../core/engines/errors';
import { YtDlpBackend, classifyExtractorError } from '../../core/resolvers/YtDlpBackend';
import type { ChildProcessLike } from '../../core/resolvers/types';

class FakeChild extends EventEmitter implements ChildProcessLike {
  stdout = new PassThrough();
  stderr = new PassThrough();
  signals: Array<NodeJS.Signals | number | undefined> = [];

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    return true;
  }
}

const URL_ = 'https://www.youtube.com/watch?v=abc';

function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

function setup(timeoutMs = 5000) {
  const calls: Array<{ command: string; args: readonly string[] }> = [];
  const children: FakeChild[] = [];
  const backend = new YtDlpBackend({
    binaryPath: 'yt-dlp-test',
    timeoutMs,
    spawnFn: (command, args) => {
      calls.push({ command, args });
      const child = new FakeChild();
      children.push(child);
      return child;
    },
  });
  return { backend, calls, children };
}

async function finish(child: FakeChild, code: number, stdout = '', stderr = ''): Promise<void> {
  if (stdout) child.stdout.write(stdout);
  if (stderr) child.stderr.write(stderr);
  await nextTick();
  child.emit('close', code);
}

describe('YtDlpBackend', () => {
  describe('classifyExtractorError', () => {
    it('debe clasificar los mensajes típicos de yt-dlp', () => {
      expect(classifyExtractorError('ERROR: Unsupported URL: https://x')).toBe(ResolutionErrorKind.NOT_SUPPORTED);
      expect(classifyExtractorError('ERROR: [youtube] abc: Private video')).toBe(
        ResolutionErrorKind.PRIVATE_OR_REMOVED
      );
      expect(classifyExtractorError('ERROR: HTTP Error 503')).toBe(ResolutionErrorKind.NETWORK_ERROR);
      expect(classifyExtractorError('ERROR: Unable to download webpage: timed out')).toBe(
        ResolutionErrorKind.NETWORK_ERROR
      );
      expect(classifyExtractorError('ERROR: Unable to extract video data')).toBe(
        ResolutionErrorKind.PLATFORM_CHANGED
      );
    });
  });

  it('debe lanzar yt-dlp sin playlist y validar el JSON', async () => {
    const { backend, calls, children } = setup();
    const pending = backend.extract(URL_);
    await finish(children[0], 0, JSON.stringify({ id: 'abc', title: 'Clip', formats: [] }));
    await expect(pending).resolves.toEqual({ id: 'abc', title: 'Clip', formats: [] });
    expect(calls).toEqual([
      { command: 'yt-dlp-test', args: ['-J', '--no-warnings', '--no-playlist', URL_] },
    ]);
  });

  it('debe decodificar caracteres multibyte partidos entre chunks', async () => {
    const { backend, children } = setup();
    const pending = backend.extract(URL_);
    const payload = Buffer.from(JSON.stringify({ id: 'abc', title: 'Canción', formats: [] }), 'utf8');
    const split = payload.indexOf(Buffer.from('ó', 'utf8')) + 1;
    children[0].stdout.write(payload.subarray(0, split));
    await nextTick();
    children[0].stdout.write(payload.subarray(split));
    await finish(children[0], 0);
    await expect(pending).resolves.toMatchObject({ title: 'Canción' });
  });

  it('debe pedir la playlist plana con el límite de entradas', async () => {
    const { backend, calls, children } = setup();
    const pending = backend.extractPlaylist('https://www.youtube.com/playlist?list=PL1', 3);
    await finish(children[0], 0, '{"_type":"playlist","entries":[]}');
    await expect(pending).resolves.toEqual({ _type: 'playlist', entries: [] });
    expect(calls[0].args).toEqual([
      '-J',
      '--no-warnings',
      '--flat-playlist',
      '--playlist-end',
      '3',
      'https://www.youtube.com/playlist?list=PL1',
    ]);
  });

  it('debe traducir la salida de error usando la línea ERROR', async () => {
    const { backend, children } = setup();
    const pending = backend.extract(URL_);
    await finish(children[0], 1, '', 'WARNING: algo\nERROR: [youtube] abc: Private video\n');
    await expect(pending).rejects.toMatchObject({
      kind: ResolutionErrorKind.PRIVATE_OR_REMOVED,
      message: 'El contenido es privado o fue eliminado: ERROR: [youtube] abc: Private video',
    });
  });

  it('debe devolver PLATFORM_CHANGED con JSON ilegible', async () => {
    const { backend, children } = setup();
    const pending = backend.extract(URL_);
    await finish(children[0], 0, '{no es json');
    await expect(pending).rejects.toMatchObject({
      kind: ResolutionErrorKind.PLATFORM_CHANGED,
      detail: 'Salida JSON ilegible',
    });
  });

  it('debe devolver NOT_SUPPORTED si el ejecutable no existe', async () => {
    const { backend, children } = setup();
    const pending = backend.extract(URL_);
    children[0].emit('error', Object.assign(new Error('spawn yt-dlp-test ENOENT'), { code: 'ENOENT' }));
    await expect(pending).rejects.toMatchObject({
      kind: ResolutionErrorKind.NOT_SUPPORTED,
      detail: 'No se encontró el ejecutable yt-dlp-test',
    });
  });

  it('debe matar el proceso y devolver CANCELLED al abortar', async () => {
    const { backend, children } = setup();
    const controller = new AbortController();
    const pending = backend.extract(URL_, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ kind: ResolutionErrorKind.CANCELLED });
    expect(children[0].signals).toEqual(['SIGTERM']);
  });

  it('no debe lanzar el proceso si la señal ya está abortada', async () => {
    const { backend, calls } = setup();
    const controller = new AbortController();
    controller.abort();
    await expect(backend.extract(URL_, controller.signal)).rejects.toMatchObject({
      kind: ResolutionErrorKind.CANCELLED,
    });
    expect(calls).toEqual([]);
  });

  it('debe devolver NETWORK_ERROR cuando vence el tiempo máximo', async () => {
    const { backend, children } = setup(10);
    await expect(backend.extract(URL_)).rejects.toMatchObject({
      kind: ResolutionErrorKind.NETWORK_ERROR,
      detail: 'yt-dlp no respondió en 10ms',
    });
    expect(children[0].signals).toEqual(['SIGTERM']);
  });
});
