/**
 * Tests de integración del motor de descargas.
 *
 * Coordina componentes reales (DownloadEngine, Scheduler, EventBus, StateStore sobre SQLite)
 * con un motor de transferencia controlado desde el test. No hay red: el foco es la cola,
 * la máquina de estados, los reintentos y la persistencia entre reinicios.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { DownloadEngine } from '../../core/engines/DownloadEngine';
import Scheduler from '../../core/engines/Scheduler';
import { StateStore } from '../../core/engines/StateStore';
import { HttpTransferEngine } from '../../core/engines/TransferEngine';
import { TransferError, TransferErrorKind } from '../../core/engines/errors';
import type { EngineEvent, MediaVariant } from '../../shared/types';
import { ScriptedTransferEngine, waitFor } from '../helpers/ScriptedTransferEngine';

const FAST_BACKOFF = { baseDelayMs: 1, maxDelayMs: 5, growthFactor: 2, jitterFactor: 0 };

function variant(name: string): MediaVariant {
  return {
    sourceUrl: `https://youtu.be/${name}`,
    formatId: '22',
    container: 'mp4',
    resolutionLabel: '720p',
    estimatedSizeBytes: 1000,
    fetchDescriptor: { url: `https://cdn.example.test/${name}.mp4`, headers: {} },
    mediaKind: 'video',
    title: `clip-${name}`,
  };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

describe('DownloadEngine (integración)', () => {
  let tmpDir: string;
  let transfers: ScriptedTransferEngine;
  let engine: DownloadEngine;

  function createEngine(maxConcurrency: number, extra: { persistence?: StateStore } = {}): DownloadEngine {
    return new DownloadEngine({
      transferEngine: transfers,
      scheduler: new Scheduler({ maxConcurrency }),
      persistence: extra.persistence ?? null,
      maxRetries: 2,
      backoff: FAST_BACKOFF,
      writeMetadata: false,
    });
  }

  function submit(target: DownloadEngine, name: string) {
    const v = variant(name);
    return target.submit({ sourceUrl: v.sourceUrl, destinationDir: tmpDir, variant: v });
  }

  function pathFor(name: string): string {
    return path.join(tmpDir, `clip-${name}.mp4`);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-dm-flow-'));
    transfers = new ScriptedTransferEngine();
    engine = createEngine(2);
    engine.initialize();
  });

  afterEach(async () => {
    await engine.shutdown();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('concurrencia', () => {
    it('debe limitar las descargas simultáneas y admitir la siguiente al terminar una', async () => {
      const a = submit(engine, 'a');
      const b = submit(engine, 'b');
      const c = submit(engine, 'c');

      expect(engine.get(a.id)?.status).toBe('downloading');
      expect(engine.get(b.id)?.status).toBe('downloading');
      expect(engine.get(c.id)?.status).toBe('queued');
      expect(transfers.running).toEqual([pathFor('a'), pathFor('b')]);

      const events: EngineEvent[] = [];
      engine.subscribe({ jobId: a.id, types: ['statusChanged'] }, event => events.push(event));

      transfers.complete(pathFor('a'), 1000);
      await waitFor(() => engine.get(c.id)?.status === 'downloading');

      expect(engine.get(a.id)).toMatchObject({ status: 'completed', bytesDownloaded: 1000, bytesTotal: 1000 });
      expect(engine.activeCount).toBe(2);
      await waitFor(() => events.length === 1);
      expect(events[0]).toMatchObject({ type: 'statusChanged', from: 'downloading', to: 'completed' });
    });

    it('bajar el límite no debe detener descargas en curso', async () => {
      engine.setConcurrency(3);
      const jobs = ['a', 'b', 'c', 'd'].map(name => submit(engine, name));
      expect(transfers.running).toHaveLength(3);

      expect(engine.setConcurrency(1)).toBe(1);
      expect(engine.activeCount).toBe(3);
      expect(transfers.requests.every(r => r.signal.requested === null)).toBe(true);

      transfers.complete(pathFor('a'), 1000);
      await waitFor(() => engine.get(jobs[0].id)?.status === 'completed');
      transfers.complete(pathFor('b'), 1000);
      await waitFor(() => engine.get(jobs[1].id)?.status === 'completed');
      expect(engine.get(jobs[3].id)?.status).toBe('queued');

      transfers.complete(pathFor('c'), 1000);
      await waitFor(() => engine.get(jobs[3].id)?.status === 'downloading');
      expect(engine.activeCount).toBe(1);
    });

    it('debe admitir antes los jobs de mayor prioridad', async () => {
      engine.setConcurrency(1);
      submit(engine, 'a');
      const low = submit(engine, 'b');
      const v = variant('c');
      const high = engine.submit({ sourceUrl: v.sourceUrl, destinationDir: tmpDir, variant: v, priority: 2 });

      transfers.complete(pathFor('a'), 1000);
      await waitFor(() => engine.get(high.id)?.status === 'downloading');
      expect(engine.get(low.id)?.status).toBe('queued');
    });
  });

  describe('reintentos', () => {
    it('debe reencolar los errores de red hasta agotar maxRetries y luego fallar', async () => {
      transfers.failWithNetworkError = true;
      const job = submit(engine, 'a');

      await waitFor(() => engine.get(job.id)?.status === 'failed');

      expect(transfers.requests).toHaveLength(3);
      expect(engine.get(job.id)).toMatchObject({
        retryCount: 2,
        lastError: 'Error de red durante la descarga: ECONNRESET',
      });
    });

    it('no debe reintentar errores de disco', async () => {
      const job = submit(engine, 'a');
      transfers.fail(pathFor('a'), new TransferError(TransferErrorKind.DISK_FULL));
      await waitFor(() => engine.get(job.id)?.status === 'failed');
      expect(engine.get(job.id)).toMatchObject({ retryCount: 0, lastError: 'Espacio insuficiente en disco' });
      expect(transfers.requests).toHaveLength(1);
    });

    it('retry explícito debe volver a la cola conservando el progreso', async () => {
      const job = submit(engine, 'a');
      transfers.progress(pathFor('a'), 400, 1000);
      transfers.fail(pathFor('a'), new TransferError(TransferErrorKind.PERMISSION_DENIED));
      await waitFor(() => engine.get(job.id)?.status === 'failed');

      const retried = engine.retry(job.id);
      expect(retried).toMatchObject({ status: 'downloading', retryCount: 1, lastError: null });
      expect(transfers.requests[1].resumeOffset).toBe(400);
    });
  });

  describe('pausa, reanudación y cancelación', () => {
    it('debe conservar el offset al pausar y reanudar', async () => {
      const job = submit(engine, 'a');
      transfers.progress(pathFor('a'), 500, 1000);

      engine.pause(job.id);
      await waitFor(() => engine.get(job.id)?.status === 'paused');
      expect(engine.get(job.id)?.bytesDownloaded).toBe(500);
      expect(fs.statSync(`${pathFor('a')}.part`).size).toBe(500);

      engine.resume(job.id);
      expect(engine.get(job.id)?.status).toBe('downloading');
      expect(transfers.requests[1]).toMatchObject({ resumeOffset: 500, expectedTotal: 1000 });
    });

    it('debe cancelar sin dejar archivos en disco', async () => {
      const job = submit(engine, 'a');
      transfers.progress(pathFor('a'), 300, 1000);
      expect(fs.existsSync(`${pathFor('a')}.part`)).toBe(true);

      expect(engine.cancel(job.id).status).toBe('cancelled');
      expect(engine.activeCount).toBe(0);
      await engine.whenIdle();

      expect(fs.existsSync(`${pathFor('a')}.part`)).toBe(false);
      expect(fs.existsSync(pathFor('a'))).toBe(false);
    });

    it('debe rechazar reanudar un job completado', async () => {
      const job = submit(engine, 'a');
      transfers.complete(pathFor('a'), 1000);
      await waitFor(() => engine.get(job.id)?.status === 'completed');
      expect(thrown(() => engine.resume(job.id))).toMatchObject({ kind: 'INVALID_TRANSITION' });
    });

    it('debe rechazar un envío duplicado mientras el primero sigue vivo', () => {
      submit(engine, 'a');
      expect(thrown(() => submit(engine, 'a'))).toMatchObject({ kind: 'DUPLICATE_SUBMISSION' });
    });
  });

  describe('admisión', () => {
    it('debe fallar en la admisión si el destino no es escribible', () => {
      const blocked = new DownloadEngine({
        transferEngine: transfers,
        scheduler: new Scheduler({ maxConcurrency: 2 }),
        checkDestination: () => ({ writable: false, error: 'EACCES: sin permiso' }),
      });
      const job = submit(blocked, 'a');
      expect(blocked.get(job.id)).toMatchObject({
        status: 'failed',
        lastError: 'No se puede escribir en la carpeta de destino: EACCES: sin permiso',
      });
      expect(transfers.requests).toHaveLength(0);
      return blocked.shutdown();
    });
  });

  describe('nombres largos', () => {
    it('debe completar títulos que superan el límite de bytes del sistema de archivos', async () => {
      const http = new HttpTransferEngine({
        opener: async () => ({
          statusCode: 200,
          headers: { 'content-length': '5' },
          body: Readable.from([Buffer.from('hello')]),
        }),
        idleTimeout: 5000,
        progressInterval: 0,
        diskSpace: async () => null,
      });
      const real = new DownloadEngine({
        transferEngine: http,
        scheduler: new Scheduler({ maxConcurrency: 2 }),
        persistence: null,
        maxRetries: 2,
        backoff: FAST_BACKOFF,
        writeMetadata: false,
      });
      real.initialize();

      const ascii = { ...variant('ascii'), title: 'a'.repeat(300) };
      const cjk = { ...variant('cjk'), title: '漢'.repeat(90) };
      const a = real.submit({ sourceUrl: ascii.sourceUrl, destinationDir: tmpDir, variant: ascii });
      const b = real.submit({ sourceUrl: cjk.sourceUrl, destinationDir: tmpDir, variant: cjk });

      await waitFor(() => real.get(a.id)?.status === 'completed' && real.get(b.id)?.status === 'completed');

      const asciiPath = path.join(tmpDir, `${'a'.repeat(238)}.mp4`);
      const cjkPath = path.join(tmpDir, `${'漢'.repeat(79)}.mp4`);
      expect(real.get(a.id)).toMatchObject({ destinationPath: asciiPath, retryCount: 0, lastError: null });
      expect(real.get(b.id)).toMatchObject({ destinationPath: cjkPath, retryCount: 0, lastError: null });
      expect(fs.readFileSync(asciiPath, 'utf8')).toBe('hello');
      expect(fs.readFileSync(cjkPath, 'utf8')).toBe('hello');
      await real.shutdown();
    });
  });

  describe('persistencia', () => {
    it('un job en pausa debe seguir en pausa y con su offset tras reiniciar', async () => {
      const dbPath = path.join(tmpDir, 'queue-state.db');
      const first = createEngine(2, { persistence: new StateStore({ dbPath }) });
      first.initialize();
      const job = submit(first, 'a');
      transfers.progress(pathFor('a'), 500000, 1000000);
      first.pause(job.id);
      await waitFor(() => first.get(job.id)?.status === 'paused');
      await first.shutdown();

      transfers = new ScriptedTransferEngine();
      const second = createEngine(2, { persistence: new StateStore({ dbPath }) });
      second.initialize();
      expect(second.get(job.id)).toMatchObject({
        status: 'paused',
        bytesDownloaded: 500000,
        bytesTotal: 1000000,
        destinationPath: pathFor('a'),
      });
      expect(transfers.requests).toHaveLength(0);

      second.resume(job.id);
      expect(transfers.requests[0].resumeOffset).toBe(500000);
      await second.shutdown();
    });

    it('un job que estaba descargando debe restaurarse en pausa', async () => {
      const dbPath = path.join(tmpDir, 'queue-state.db');
      const store = new StateStore({ dbPath });
      store.initialize();
      const v = variant('a');
      store.save({
        id: '22222222-2222-4222-8222-222222222222',
        sourceUrl: v.sourceUrl,
        selectedVariant: v,
        destinationDir: tmpDir,
        destinationPath: pathFor('a'),
        status: 'downloading',
        bytesDownloaded: 700,
        bytesTotal: 1000,
        createdAt: 1700000000000,
        updatedAt: 1700000000000,
        retryCount: 0,
        lastError: null,
        priority: 1,
        enqueueSeq: 9,
        retryAt: null,
      });
      store.close();

      const restored = createEngine(2, { persistence: new StateStore({ dbPath }) });
      restored.initialize();
      expect(restored.get('22222222-2222-4222-8222-222222222222')).toMatchObject({
        status: 'paused',
        bytesDownloaded: 700,
      });
      expect(transfers.requests).toHaveLength(0);

      const next = submit(restored, 'b');
      expect(next.enqueueSeq).toBe(10);
      await restored.shutdown();
    });
  });
});
