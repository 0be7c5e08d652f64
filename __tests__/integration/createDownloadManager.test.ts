/**
 * Test de integración del ensamblado completo (createDownloadManager) con un backend de
 * extracción simulado y la cola en una base SQLite en memoria.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createDownloadManager, type DownloadManager } from '../../core';
import { ResolutionError, ResolutionErrorKind } from '../../core/engines/errors';
import type { ExtractionBackend } from '../../core/resolvers/types';
import { waitFor } from '../helpers/ScriptedTransferEngine';

const privateBackend: ExtractionBackend = {
  extract: async () => {
    throw new ResolutionError(ResolutionErrorKind.PRIVATE_OR_REMOVED, 'Private video');
  },
  extractPlaylist: async () => ({ title: 'vacío' }),
};

describe('createDownloadManager', () => {
  let tmpDir: string;
  let manager: DownloadManager;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-dm-manager-'));
    manager = createDownloadManager({
      dbPath: ':memory:',
      settingsPath: path.join(tmpDir, 'settings.json'),
      backend: privateBackend,
      configureLogging: false,
    });
    await manager.initialize();
  });

  afterEach(async () => {
    await manager.destroy();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('debe inicializar los servicios con la cola vacía', () => {
    expect(manager.services.initialized).toBe(true);
    expect(manager.settings.isInitialized()).toBe(true);
    expect(manager.downloads.snapshot().data?.summary.total).toBe(0);
  });

  it('debe llevar a failed un job cuya resolución falla', async () => {
    const response = manager.downloads.submit({ url: 'https://www.youtube.com/watch?v=abc', destinationDir: tmpDir });
    const jobId = response.data?.id ?? '';
    await waitFor(() => manager.downloads.get(jobId).data?.status === 'failed');
    expect(manager.downloads.get(jobId).data?.lastError).toBe('El contenido es privado o fue eliminado: Private video');
  });

  it('debe rechazar URLs de plataformas desconocidas', () => {
    const response = manager.downloads.submit({ url: 'https://example.test/a.mp4', destinationDir: tmpDir });
    expect(response.code).toBe('resolution.NOT_SUPPORTED');
  });
});
