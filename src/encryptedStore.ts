import Database from 'better-sqlite3';
import { createHash } from 'crypto';
import { open as openFile, readFile, rename, unlink } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import {
  ContainerError,
  OpenFailedError,
  StoreClosedError,
  TransactionFailedError,
  errorMessage,
} from './errors';
import type { KeyHandle } from './keyMaterial';
import { logDebug } from './logger';
import { BOOKS_TABLE, EXPECTED_BOOK_COLUMNS, SCHEMA_SQL } from './schema';
import type { CloseReport, IntegrityReport, IntegrityState } from './types';
import { VaultCipher } from './vaultCipher';

export type SqliteDatabase = Database.Database;

export interface EncryptedStoreOptions {
  cipher?: VaultCipher;
}

// Resolved paths with a live store in this process.
const openPaths = new Set<string>();

/**
 * EncryptedStore owns one encrypted catalog file for the lifetime of a session.
 *
 * The file is an OpenPGP container around a complete SQLite image. On open the
 * container is decrypted and the image is loaded into an in-memory better-sqlite3
 * connection; every committed transaction that changed something is serialized,
 * sealed again and written back by atomic rename. The file on disk is therefore
 * always either the previous or the new committed state.
 *
 * Typical lifecycle:
 *   const store = await EncryptedStore.open(path, key);
 *   store.verifyIntegrity();
 *   await store.transaction((db) => ...);
 *   await store.close();
 */
export class EncryptedStore {
  private db: SqliteDatabase | null;
  private integrityState: IntegrityState = 'unchecked';
  private writeQueue: Promise<void> = Promise.resolve();
  private closing: Promise<CloseReport> | null = null;

  private constructor(
    readonly path: string,
    db: SqliteDatabase,
    private readonly key: KeyHandle,
    private readonly cipher: VaultCipher,
    /** Plaintext image matching what is currently on disk. */
    private committedImage: Buffer,
    private readonly initialDigest: string,
    private currentDigest: string
  ) {
    this.db = db;
  }

  /**
   * Open (or create) the catalog at `path` using `key`.
   *
   * A missing or empty file is created with the fixed schema. An existing file must
   * decrypt with `key` and contain a SQLite image, otherwise `OpenFailedError`.
   */
  static async open(
    path: string,
    key: KeyHandle,
    options: EncryptedStoreOptions = {}
  ): Promise<EncryptedStore> {
    const resolved = resolve(path);
    if (openPaths.has(resolved)) {
      throw new OpenFailedError(resolved, 'already-open');
    }

    // Claim the path before the first await so overlapping opens see it.
    openPaths.add(resolved);

    try {
      const cipher = options.cipher ?? new VaultCipher();
      const container = await readContainer(resolved);

      // No file, or an empty one left by `touch`: start a new catalog.
      return container
        ? await EncryptedStore.load(resolved, container, key, cipher)
        : await EncryptedStore.create(resolved, key, cipher);
    } catch (error) {
      openPaths.delete(resolved);
      throw error;
    }
  }

  private static async create(path: string, key: KeyHandle, cipher: VaultCipher): Promise<EncryptedStore> {
    const db = new Database(':memory:');
    db.exec(SCHEMA_SQL);

    const image = db.serialize();
    const store = new EncryptedStore(path, db, key, cipher, image, '', '');

    try {
      await store.persist(image);
    } catch (error) {
      db.close();
      throw new OpenFailedError(path, 'io', { cause: error });
    }

    logDebug(`[store] created ${path}`);
    return store;
  }

  private static async load(
    path: string,
    container: Buffer,
    key: KeyHandle,
    cipher: VaultCipher
  ): Promise<EncryptedStore> {
    // Decrypt the container back into a plaintext SQLite image.
    let image: Uint8Array;
    try {
      image = await cipher.open(container, key);
    } catch (error) {
      if (!(error instanceof ContainerError)) throw error;
      logDebug(`[store] could not decrypt ${path} (${container.length} bytes)`);
      throw new OpenFailedError(path, 'wrong-key-or-tampered', { cause: error });
    }

    let db: SqliteDatabase | null = null;
    let schemaCreated = false;
    try {
      db = new Database(Buffer.from(image));
      // The first read of sqlite_master is where a non-database image fails.
      schemaCreated = !hasTable(db, BOOKS_TABLE);
      if (schemaCreated) db.exec(SCHEMA_SQL);
    } catch (error) {
      db?.close();
      throw new OpenFailedError(path, 'not-a-database', { cause: error });
    }

    const digest = sha256(container);
    const store = new EncryptedStore(path, db, key, cipher, db.serialize(), digest, digest);

    // A database without the books table gets the schema and is written back at once.
    if (schemaCreated) {
      try {
        await store.persist(db.serialize());
      } catch (error) {
        db.close();
        throw new OpenFailedError(path, 'io', { cause: error });
      }
    }

    logDebug(`[store] opened ${path} (${container.length} bytes)`);
    return store;
  }

  get integrity(): IntegrityState {
    return this.integrityState;
  }

  get isOpen(): boolean {
    return this.db !== null && this.closing === null;
  }

  /**
   * Full structural check of the decrypted catalog.
   *
   * Runs SQLite's `integrity_check` over every page and index, then checks the
   * books table shape, the id high-water mark, and the status/date invariant
   * row by row. Engine errors raised by damaged pages become a corrupted report.
   */
  verifyIntegrity(): IntegrityReport {
    const db = this.requireOpen();

    let report: IntegrityReport;
    try {
      const details = [...pageProblems(db)];
      if (details.length === 0) {
        details.push(...schemaProblems(db));
      }
      if (details.length === 0) {
        details.push(...rowProblems(db));
      }
      report = details.length === 0 ? { status: 'ok' } : { status: 'corrupted', details };
    } catch (error) {
      if (!(error instanceof Database.SqliteError)) throw error;
      report = { status: 'corrupted', details: [`${error.code}: ${error.message}`] };
    }

    this.integrityState = report.status;
    logDebug(`[store] integrity ${report.status} for ${this.path}`);
    return report;
  }

  /**
   * Run `body` as one atomic unit of work.
   *
   * `body` runs synchronously inside an engine transaction; a throw rolls it back
   * and is rethrown (engine errors as `TransactionFailedError`). After commit the
   * new image is sealed and written; if that fails the in-memory state is rolled
   * back to the last written image and `TransactionFailedError` is thrown.
   * Calls are queued, so commits never interleave.
   */
  transaction<T>(body: (db: SqliteDatabase) => T): Promise<T> {
    if (this.closing) {
      return Promise.reject(new StoreClosedError());
    }

    const task = this.writeQueue.then(() => this.runTransaction(body));
    // Keep the queue alive after a failed task; the caller still sees the rejection.
    this.writeQueue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }

  private async runTransaction<T>(body: (db: SqliteDatabase) => T): Promise<T> {
    const db = this.requireOpen();
    const markerBefore = changeMarker(db);

    let result: T;
    try {
      result = db.transaction(() => body(db))();
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        throw new TransactionFailedError(`Transaction rolled back: ${error.message}`, { cause: error });
      }
      throw error;
    }

    // Read-only bodies leave the file alone.
    if (changeMarker(db) === markerBefore) {
      return result;
    }

    try {
      await this.persist(db.serialize());
    } catch (error) {
      // The engine already committed; put the in-memory image back to what the file holds.
      this.rollbackToCommitted();
      logDebug(`[store] write failed, rolled back: ${errorMessage(error)}`);
      throw new TransactionFailedError('Could not save the catalog; the change was rolled back', {
        cause: error,
      });
    }

    return result;
  }

  /** Synchronous read access. Single statements are atomic in the engine. */
  read<T>(body: (db: SqliteDatabase) => T): T {
    return body(this.requireOpen());
  }

  /**
   * Rows of one SELECT, fetched when iteration starts.
   *
   * The rows are read in a single statement run, so the connection is free
   * again before the first row reaches the caller and writes made while
   * iterating do not collide with an open cursor.
   */
  *iterate<Row>(sql: string, params: readonly unknown[] = []): IterableIterator<Row> {
    const rows = this.read((db) => db.prepare<unknown[], Row>(sql).all(...params));
    yield* rows;
  }

  /**
   * Wait for queued writes, then release the connection and the key material.
   * Safe to call more than once; later calls return the first report.
   */
  close(): Promise<CloseReport> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<CloseReport> {
    await this.writeQueue;

    this.db?.close();
    this.db = null;
    this.key.destroy();
    openPaths.delete(this.path);

    const report: CloseReport = {
      initialDigest: this.initialDigest,
      finalDigest: this.currentDigest,
      changed: this.initialDigest !== this.currentDigest,
    };
    logDebug(`[store] closed ${this.path} (changed: ${report.changed})`);
    return report;
  }

  private requireOpen(): SqliteDatabase {
    if (!this.db) throw new StoreClosedError();
    return this.db;
  }

  private async persist(image: Buffer): Promise<void> {
    const sealed = await this.cipher.seal(image, this.key);
    await writeFileAtomic(this.path, sealed);

    // Only a successful rename makes this image the new rollback point.
    this.committedImage = image;
    this.currentDigest = sha256(sealed);
  }

  private rollbackToCommitted(): void {
    this.requireOpen().close();
    // better-sqlite3 copies the buffer, so the committed image stays reusable.
    this.db = new Database(this.committedImage);
  }
}

const readContainer = async (path: string): Promise<Buffer | null> => {
  try {
    const container = await readFile(path);
    return container.length === 0 ? null : container;
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new OpenFailedError(path, 'io', { cause: error });
  }
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Write to a temp file beside `path`, fsync, then rename over it. */
const writeFileAtomic = async (path: string, data: Uint8Array): Promise<void> => {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);

  try {
    const handle = await openFile(tempPath, 'w', 0o600);
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logDebug(`[store] could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw error;
  }
};

const sha256 = (data: Uint8Array): string => createHash('sha256').update(data).digest('hex');

/**
 * Row changes plus the schema cookie. `total_changes()` alone misses DDL, which
 * only bumps `schema_version`.
 */
const changeMarker = (db: SqliteDatabase): string => {
  const changes = db.prepare<[], { changes: number }>('SELECT total_changes() AS changes').get()?.changes ?? 0;
  const schema = db.prepare<[], { schema_version: number }>('PRAGMA schema_version').get()?.schema_version ?? 0;
  return `${changes}:${schema}`;
};

const hasTable = (db: SqliteDatabase, name: string): boolean =>
  db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name) !== undefined;

function pageProblems(db: SqliteDatabase): string[] {
  return db
    .prepare<[], { integrity_check: string }>('PRAGMA integrity_check')
    .all()
    .map((row) => row.integrity_check)
    .filter((line) => line !== 'ok');
}

function schemaProblems(db: SqliteDatabase): string[] {
  if (!hasTable(db, BOOKS_TABLE)) {
    return [`table "${BOOKS_TABLE}" is missing`];
  }

  const columns = db
    .prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)')
    .all(BOOKS_TABLE)
    .map((row) => row.name);

  if (columns.join(',') !== EXPECTED_BOOK_COLUMNS.join(',')) {
    return [`table "${BOOKS_TABLE}" has columns (${columns.join(', ')}), expected (${EXPECTED_BOOK_COLUMNS.join(', ')})`];
  }
  return [];
}

function rowProblems(db: SqliteDatabase): string[] {
  const problems = db
    .prepare<[], { id: number }>(
      `SELECT id FROM books
       WHERE status NOT IN ('unread', 'reading', 'read')
          OR (status = 'read') <> (date_finished IS NOT NULL)
          OR length(trim(title)) = 0
       ORDER BY id`
    )
    .all()
    .map((row) => `book ${row.id} has inconsistent status or title fields`);

  const sequence = db
    .prepare<[string], { seq: number }>('SELECT seq FROM sqlite_sequence WHERE name = ?')
    .get(BOOKS_TABLE);
  const highest = db.prepare<[], { id: number | null }>('SELECT MAX(id) AS id FROM books').get();
  if (highest?.id != null && (sequence === undefined || sequence.seq < highest.id)) {
    problems.push(`id sequence (${sequence?.seq ?? 'missing'}) is behind the highest id (${highest.id})`);
  }

  return problems;
}
