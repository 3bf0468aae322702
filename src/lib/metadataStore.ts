/**
 * Durable, deduplicating store of MediaRecords, keyed by absolute path.
 *
 * One SQLite table, `media_files`, with a UNIQUE path column. Writes use
 * `INSERT OR IGNORE`: the first upsert of a path wins and later ones are silent
 * no-ops, so metadata is never updated and a path is never duplicated.
 *
 * better-sqlite3 is synchronous; every call completes (and is committed) before
 * it returns, which is what lets the scan report a file as done only after its
 * row is on disk.
 */
import path from 'node:path';
import Database from 'better-sqlite3';
import fse from 'fs-extra';
import type { FileType, MediaRecord, MediaRecordInput, MediaRow, StorageStats } from '../types';
import { createLogger } from './logger';

const logger = createLogger('metadata-store');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS media_files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT UNIQUE NOT NULL,
    filename TEXT NOT NULL,
    extension TEXT NOT NULL,
    file_type TEXT NOT NULL CHECK (file_type IN ('image', 'video', 'unknown')),
    size INTEGER,
    modified_at INTEGER,
    discovered_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS media_files_discovered_at ON media_files (discovered_at, id);
`;

const COLUMNS = 'id, path, filename, extension, file_type, size, modified_at, discovered_at';

function toFileType(value: string): FileType {
  return value === 'image' || value === 'video' ? value : 'unknown';
}

function rowToRecord(row: MediaRow): MediaRecord {
  return {
    path: row.path,
    filename: row.filename,
    extension: row.extension,
    fileType: toFileType(row.file_type),
    size: row.size,
    modifiedAt: row.modified_at,
    discoveredAt: row.discovered_at,
  };
}

/** `/a/photos` → `/a/photos/`, so prefix matching never hits `/a/photos_old`. */
function folderPrefix(folder: string): string {
  const resolved = path.resolve(folder);
  return resolved.endsWith(path.sep) ? resolved : `${resolved}${path.sep}`;
}

interface InsertParams {
  path: string;
  filename: string;
  extension: string;
  fileType: FileType;
  size: number | null;
  modifiedAt: number | null;
  discoveredAt: number;
}

export class MetadataStore {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<[InsertParams]>;
  private readonly getStmt: Database.Statement<[string], MediaRow>;
  private readonly allStmt: Database.Statement<[], MediaRow>;
  private readonly underStmt: Database.Statement<[string], MediaRow>;
  private readonly countStmt: Database.Statement<[], { total: number }>;
  private readonly pathsStmt: Database.Statement<[], { path: string }>;
  private readonly byTypeStmt: Database.Statement<[], { file_type: string; total: number }>;
  private readonly removeUnderStmt: Database.Statement<[string]>;
  private readonly insertMany: (records: readonly MediaRecordInput[]) => number;

  readonly databasePath: string;

  private constructor(databasePath: string, db: Database.Database) {
    this.databasePath = databasePath;
    this.db = db;
    this.db.exec(SCHEMA);

    this.insertStmt = db.prepare<InsertParams>(`
      INSERT OR IGNORE INTO media_files
        (path, filename, extension, file_type, size, modified_at, discovered_at)
      VALUES (@path, @filename, @extension, @fileType, @size, @modifiedAt, @discoveredAt)
    `);
    this.getStmt = db.prepare<[string], MediaRow>(`SELECT ${COLUMNS} FROM media_files WHERE path = ?`);
    this.allStmt = db.prepare<[], MediaRow>(
      `SELECT ${COLUMNS} FROM media_files ORDER BY discovered_at ASC, id ASC`,
    );
    this.underStmt = db.prepare<[string], MediaRow>(
      `SELECT ${COLUMNS} FROM media_files WHERE instr(path, ?) = 1 ORDER BY discovered_at ASC, id ASC`,
    );
    this.countStmt = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM media_files');
    this.pathsStmt = db.prepare<[], { path: string }>('SELECT path FROM media_files');
    this.byTypeStmt = db.prepare<[], { file_type: string; total: number }>(
      'SELECT file_type, COUNT(*) AS total FROM media_files GROUP BY file_type',
    );
    this.removeUnderStmt = db.prepare<[string]>('DELETE FROM media_files WHERE instr(path, ?) = 1');

    this.insertMany = db.transaction((records: readonly MediaRecordInput[]) => {
      let added = 0;
      for (const record of records) {
        if (this.insertRecord(record)) added += 1;
      }
      return added;
    });
  }

  /**
   * Open (or create) the store. Creates the parent directory and the table on
   * first run; `:memory:` gives a throwaway store.
   */
  static open(databasePath: string): MetadataStore {
    const inMemory = databasePath === ':memory:';
    if (!inMemory) {
      fse.ensureDirSync(path.dirname(path.resolve(databasePath)));
    }
    const db = new Database(databasePath);
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
    }
    logger.debug('opened', { databasePath });
    return new MetadataStore(databasePath, db);
  }

  private insertRecord(record: MediaRecordInput): boolean {
    const result = this.insertStmt.run({
      path: record.path,
      filename: record.filename,
      extension: record.extension,
      fileType: record.fileType,
      size: record.size,
      modifiedAt: record.modifiedAt,
      discoveredAt: record.discoveredAt ?? Date.now(),
    });
    return result.changes > 0;
  }

  /** Insert if absent. Returns true when a new row was written, false for a known path. */
  upsert(record: MediaRecordInput): boolean {
    return this.insertRecord(record);
  }

  /** Batch insert in one transaction. Returns the number of new rows. */
  upsertMany(records: readonly MediaRecordInput[]): number {
    if (records.length === 0) return 0;
    return this.insertMany(records);
  }

  get(filePath: string): MediaRecord | null {
    const row = this.getStmt.get(filePath);
    return row ? rowToRecord(row) : null;
  }

  has(filePath: string): boolean {
    return this.getStmt.get(filePath) !== undefined;
  }

  loadAll(): MediaRecord[] {
    return this.allStmt.all().map(rowToRecord);
  }

  loadUnder(folder: string): MediaRecord[] {
    const prefix = folderPrefix(folder);
    return this.underStmt.all(prefix).map(rowToRecord);
  }

  /** Distinct parent directories of every record, sorted. */
  listFolders(): string[] {
    const folders = new Set<string>();
    for (const row of this.pathsStmt.iterate()) {
      folders.add(path.dirname(row.path));
    }
    return Array.from(folders).sort();
  }

  removeUnder(folder: string): number {
    const prefix = folderPrefix(folder);
    const result = this.removeUnderStmt.run(prefix);
    logger.info('removed records under folder', { folder, removed: result.changes });
    return result.changes;
  }

  count(): number {
    return this.countStmt.get()?.total ?? 0;
  }

  stats(): StorageStats {
    const byType: Record<FileType, number> = { image: 0, video: 0, unknown: 0 };
    let records = 0;
    for (const row of this.byTypeStmt.all()) {
      byType[toFileType(row.file_type)] += row.total;
      records += row.total;
    }
    return { records, byType, databaseBytes: this.databaseBytes() };
  }

  private databaseBytes(): number {
    if (this.databasePath === ':memory:') return 0;
    let total = 0;
    for (const file of [this.databasePath, `${this.databasePath}-wal`, `${this.databasePath}-shm`]) {
      if (fse.pathExistsSync(file)) {
        total += fse.statSync(file).size;
      }
    }
    return total;
  }

  /** Reclaim space left by removed rows. */
  optimize(): void {
    this.db.exec('VACUUM');
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
