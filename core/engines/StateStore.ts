/**
 * Persistencia de la tabla de jobs (SQLite WAL vía better-sqlite3, archivo queue-state.db).
 *
 * Una fila por job con la variante serializada en JSON. save() hace upsert; load() valida
 * cada fila con Zod y descarta las dañadas (SystemError PERSISTENCE_CORRUPT) sin afectar
 * al resto. Si el archivo no se puede abrir como base de datos se aparta con sufijo
 * `.corrupt-<fecha>` y se crea uno nuevo.
 *
 * @module StateStore
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import config from '../config';
import { logger } from '../utils';
import { mediaVariantSchema, persistedJobRowSchema, type PersistedJobRow } from '../utils/schemas';
import type { JobSnapshot, MediaVariant } from '../../shared/types';
import { SystemError, SystemErrorKind } from './errors';
import type { DroppedPersistedJob, IJobPersistence, PersistenceLoadResult } from './types';

const log = logger.child('StateStore');

const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS jobs (
    id TEXT PRIMARY KEY,
    source_url TEXT NOT NULL,
    variant_json TEXT,
    destination_dir TEXT NOT NULL,
    destination_path TEXT,
    status TEXT NOT NULL,
    bytes_downloaded INTEGER NOT NULL DEFAULT 0,
    bytes_total INTEGER,
    priority INTEGER NOT NULL DEFAULT 1,
    retry_count INTEGER NOT NULL DEFAULT 0,
    last_error TEXT,
    enqueue_seq INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
`;

const UPSERT_SQL = `
INSERT INTO jobs (
    id, source_url, variant_json, destination_dir, destination_path, status,
    bytes_downloaded, bytes_total, priority, retry_count, last_error, enqueue_seq,
    created_at, updated_at
) VALUES (
    @id, @source_url, @variant_json, @destination_dir, @destination_path, @status,
    @bytes_downloaded, @bytes_total, @priority, @retry_count, @last_error, @enqueue_seq,
    @created_at, @updated_at
)
ON CONFLICT(id) DO UPDATE SET
    variant_json = excluded.variant_json,
    destination_path = excluded.destination_path,
    status = excluded.status,
    bytes_downloaded = excluded.bytes_downloaded,
    bytes_total = excluded.bytes_total,
    priority = excluded.priority,
    retry_count = excluded.retry_count,
    last_error = excluded.last_error,
    enqueue_seq = excluded.enqueue_seq,
    updated_at = excluded.updated_at
`;

export interface StateStoreOptions {
  /** Ruta del archivo; ':memory:' para una base en memoria. */
  dbPath?: string;
}

function toRow(job: JobSnapshot): PersistedJobRow {
  return {
    id: job.id,
    source_url: job.sourceUrl,
    variant_json: job.selectedVariant ? JSON.stringify(job.selectedVariant) : null,
    destination_dir: job.destinationDir,
    destination_path: job.destinationPath,
    status: job.status,
    bytes_downloaded: job.bytesDownloaded,
    bytes_total: job.bytesTotal,
    priority: job.priority,
    retry_count: job.retryCount,
    last_error: job.lastError,
    enqueue_seq: job.enqueueSeq,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
  };
}

function parseVariant(json: string | null): MediaVariant | null {
  if (json == null) return null;
  const result = mediaVariantSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    throw new Error(`variante inválida: ${result.error.issues.map(i => i.message).join('; ')}`);
  }
  return result.data;
}

function rowId(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    return String(raw.id);
  }
  return '?';
}

/** Adaptador de persistencia de la cola sobre SQLite. */
export class StateStore implements IJobPersistence {
  private _db: Database.Database | null = null;
  private upsertStatement: Database.Statement | null = null;
  private readonly dbPath: string;

  constructor(options: StateStoreOptions = {}) {
    this.dbPath = options.dbPath ?? config.paths.queueDbPath;
  }

  /** Acceso a la BD (tests / uso interno). */
  get db(): Database.Database | null {
    return this._db;
  }

  get isInitialized(): boolean {
    return this._db !== null;
  }

  /**
   * Abre (o crea) la base y prepara el schema. Un archivo que no es una base SQLite válida
   * se aparta y se empieza con una vacía.
   */
  initialize(): void {
    if (this._db) {
      log.warn('StateStore ya está inicializado');
      return;
    }
    if (this.dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    let db: Database.Database;
    try {
      db = this.open();
    } catch (error) {
      if (this.dbPath === ':memory:') throw error;
      const aside = `${this.dbPath}.corrupt-${Date.now()}`;
      log.warn(
        `${new SystemError(SystemErrorKind.PERSISTENCE_CORRUPT, this.dbPath).message}; se aparta como ${aside}:`,
        error
      );
      fs.renameSync(this.dbPath, aside);
      for (const suffix of ['-wal', '-shm']) {
        if (fs.existsSync(this.dbPath + suffix)) fs.unlinkSync(this.dbPath + suffix);
      }
      db = this.open();
    }
    this._db = db;
    this.upsertStatement = db.prepare(UPSERT_SQL);
    log.info(`StateStore inicializado: ${this.dbPath}`);
  }

  private open(): Database.Database {
    const db = new Database(this.dbPath);
    try {
      if (this.dbPath !== ':memory:') db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.exec(CREATE_SCHEMA_SQL);
    } catch (error) {
      db.close();
      throw error;
    }
    return db;
  }

  private requireDb(): Database.Database {
    if (!this._db) this.initialize();
    if (!this._db) throw new SystemError(SystemErrorKind.PERSISTENCE_CORRUPT, 'base no disponible');
    return this._db;
  }

  /** Lee todos los jobs; las filas que no pasan la validación se devuelven en dropped. */
  load(): PersistenceLoadResult {
    const db = this.requireDb();
    const rawRows: unknown[] = db.prepare('SELECT * FROM jobs ORDER BY enqueue_seq ASC').all();
    const jobs: JobSnapshot[] = [];
    const dropped: DroppedPersistedJob[] = [];

    for (const raw of rawRows) {
      const parsed = persistedJobRowSchema.safeParse(raw);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map(issue => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        dropped.push({
          id: rowId(raw),
          error: new SystemError(SystemErrorKind.PERSISTENCE_CORRUPT, detail),
        });
        continue;
      }
      const row = parsed.data;
      try {
        jobs.push({
          id: row.id,
          sourceUrl: row.source_url,
          selectedVariant: parseVariant(row.variant_json),
          destinationDir: row.destination_dir,
          destinationPath: row.destination_path,
          status: row.status,
          bytesDownloaded: row.bytes_downloaded,
          bytesTotal: row.bytes_total,
          createdAt: row.created_at,
          updatedAt: row.updated_at,
          retryCount: row.retry_count,
          lastError: row.last_error,
          priority: row.priority,
          enqueueSeq: row.enqueue_seq,
          retryAt: null,
        });
      } catch (error) {
        dropped.push({
          id: row.id,
          error: new SystemError(
            SystemErrorKind.PERSISTENCE_CORRUPT,
            error instanceof Error ? error.message : String(error),
            { cause: error }
          ),
        });
      }
    }

    return { jobs, dropped };
  }

  save(job: JobSnapshot): void {
    this.requireDb();
    this.upsertStatement?.run(toRow(job));
  }

  remove(jobId: string): void {
    this.requireDb().prepare('DELETE FROM jobs WHERE id = ?').run(jobId);
  }

  close(): void {
    if (!this._db) return;
    if (this.dbPath !== ':memory:') this._db.pragma('wal_checkpoint(TRUNCATE)');
    this._db.close();
    this._db = null;
    this.upsertStatement = null;
    log.info('StateStore cerrado');
  }
}

export default StateStore;
