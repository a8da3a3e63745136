import type { EncryptedStore, SqliteDatabase } from './encryptedStore';
import {
  IntegrityError,
  NotFoundError,
  StoreNotVerifiedError,
  TransactionFailedError,
  ValidationError,
  type CatalogError,
} from './errors';
import { err, ok, type Result } from './result';
import { BOOK_COLUMNS_SQL } from './schema';
import type {
  Book,
  BookFields,
  BookOrderField,
  BookRow,
  BookStatus,
  ListFilter,
} from './types';
import { isBookStatus, validateBookFields, validateBookId, validateNewBook } from './validation';

export interface BookRepositoryOptions {
  /** Clock used for every timestamp the repository writes. */
  now?: () => Date;
}

const ORDER_COLUMNS: Record<BookOrderField, string> = {
  id: 'id',
  title: 'title COLLATE NOCASE',
  author: 'author COLLATE NOCASE',
  dateAdded: 'date_added',
  dateFinished: 'date_finished',
};

/**
 * A lazy, restartable view over the catalog.
 *
 * Nothing is read until iteration starts, and each new iteration runs the query
 * again, so a listing taken before a mutation reflects it when iterated after.
 */
export class BookListing implements Iterable<Book> {
  constructor(
    private readonly store: EncryptedStore,
    private readonly sql: string,
    private readonly params: readonly unknown[]
  ) {}

  *[Symbol.iterator](): Iterator<Book> {
    for (const row of this.store.iterate<BookRow>(this.sql, this.params)) {
      yield toBook(row);
    }
  }

  toArray(): Book[] {
    return Array.from(this);
  }
}

/**
 * BookRepository translates catalog intents into store transactions.
 *
 * Input is checked against the field constraint table before a transaction
 * opens. Recoverable failures (`ValidationError`, `NotFoundError`,
 * `TransactionFailedError`) come back as `Result` errors; anything else is a
 * programming error and is thrown.
 */
export class BookRepository {
  private readonly now: () => Date;

  constructor(
    private readonly store: EncryptedStore,
    options: BookRepositoryOptions = {}
  ) {
    if (store.integrity !== 'ok') {
      throw new StoreNotVerifiedError(store.integrity);
    }
    this.now = options.now ?? (() => new Date());
  }

  async add(title: string, author: string, status: BookStatus = 'unread'): Promise<Result<Book, CatalogError>> {
    const input = validateNewBook({ title, author, status });
    if (!input.ok) return input;

    const { value } = input;
    const timestamp = this.now().toISOString();
    const started = value.status === 'unread' ? null : timestamp;
    const finished = value.status === 'read' ? timestamp : null;

    return this.run((db) => {
      const { lastInsertRowid } = db
        .prepare(
          `INSERT INTO books (title, author, status, date_added, date_started, date_finished, last_modified)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(value.title, value.author, value.status, timestamp, started, finished, timestamp);
      return requireBook(db, Number(lastInsertRowid));
    });
  }

  list(filter: ListFilter = {}): BookListing {
    const { status, orderBy = 'id', direction = 'asc' } = filter;
    if (status !== undefined && !isBookStatus(status)) {
      throw new ValidationError('status', `Unknown status filter: ${String(status)}`);
    }

    const dir = direction === 'desc' ? 'DESC' : 'ASC';
    const order = orderBy === 'id' ? `id ${dir}` : `${ORDER_COLUMNS[orderBy]} ${dir}, id ASC`;
    const where = status ? 'WHERE status = ?' : '';
    const sql = `SELECT ${BOOK_COLUMNS_SQL} FROM books ${where} ORDER BY ${order}`;

    return new BookListing(this.store, sql, status ? [status] : []);
  }

  async edit(id: number, fields: BookFields): Promise<Result<Book, CatalogError>> {
    const checkedId = validateBookId(id);
    if (!checkedId.ok) return checkedId;
    const checked = validateBookFields(fields);
    if (!checked.ok) return checked;

    const changes = checked.value;
    const now = this.now();

    // Read, merge and write inside one transaction.
    return this.run((db) => {
      const next = applyEdit(toBook(findRow(db, id)), changes, now);
      db.prepare(
        `UPDATE books
         SET title = ?, author = ?, status = ?, date_started = ?, date_finished = ?, last_modified = ?
         WHERE id = ?`
      ).run(
        next.title,
        next.author,
        next.status,
        toIso(next.dateStarted),
        toIso(next.dateFinished),
        next.lastModified.toISOString(),
        id
      );
      return requireBook(db, id);
    });
  }

  /** Mark a book read. Already-read books are returned untouched. */
  async markRead(id: number): Promise<Result<Book, CatalogError>> {
    const checkedId = validateBookId(id);
    if (!checkedId.ok) return checkedId;

    const timestamp = this.now().toISOString();

    return this.run((db) => {
      const current = toBook(findRow(db, id));
      // No UPDATE, so the transaction commits nothing and the file is not rewritten.
      if (current.status === 'read') return current;

      db.prepare(
        `UPDATE books
         SET status = 'read', date_finished = ?, date_started = COALESCE(date_started, ?), last_modified = ?
         WHERE id = ?`
      ).run(timestamp, timestamp, timestamp, id);
      return requireBook(db, id);
    });
  }

  async delete(id: number): Promise<Result<void, CatalogError>> {
    const checkedId = validateBookId(id);
    if (!checkedId.ok) return checkedId;

    return this.run((db) => {
      const { changes } = db.prepare('DELETE FROM books WHERE id = ?').run(id);
      if (changes === 0) throw new NotFoundError(id);
    });
  }

  private async run<T>(body: (db: SqliteDatabase) => T): Promise<Result<T, CatalogError>> {
    try {
      return ok(await this.store.transaction(body));
    } catch (error) {
      if (
        error instanceof NotFoundError ||
        error instanceof ValidationError ||
        error instanceof TransactionFailedError
      ) {
        return err(error);
      }
      throw error;
    }
  }
}

/**
 * Merge a validated partial update into the current record and re-apply the
 * status/date rules: `dateFinished` exists only while the status is `read`,
 * and a status transition fills `dateStarted` if it was never set.
 */
export const applyEdit = (current: Book, changes: BookFields, now: Date): Book => {
  const status = changes.status ?? current.status;
  const statusChanged = status !== current.status;

  // Finish date: required while read, forbidden otherwise.
  let dateFinished: Date | null;
  if (status === 'read') {
    if (changes.dateFinished === null) {
      throw new ValidationError('dateFinished', 'A read book must keep its finish date');
    }
    // An explicit date wins; a fresh transition to read stamps now; otherwise keep the old one.
    dateFinished = changes.dateFinished ?? (statusChanged ? now : current.dateFinished) ?? now;
  } else {
    if (changes.dateFinished) {
      throw new ValidationError('dateFinished', 'Only books marked read can have a finish date');
    }
    dateFinished = null;
  }

  // Leaving unread for the first time starts the book, unless a start date was typed.
  let dateStarted = changes.dateStarted !== undefined ? changes.dateStarted : current.dateStarted;
  if (statusChanged && status !== 'unread' && dateStarted === null && changes.dateStarted === undefined) {
    dateStarted = now;
  }

  if (dateStarted && dateFinished && dateStarted.getTime() > dateFinished.getTime()) {
    throw new ValidationError('dateStarted', 'Start date cannot be after the finish date');
  }

  return {
    ...current,
    title: changes.title ?? current.title,
    author: changes.author ?? current.author,
    status,
    dateStarted,
    dateFinished,
    lastModified: now,
  };
};

const findRow = (db: SqliteDatabase, id: number): BookRow => {
  const row = db.prepare<[number], BookRow>(`SELECT ${BOOK_COLUMNS_SQL} FROM books WHERE id = ?`).get(id);
  if (!row) throw new NotFoundError(id);
  return row;
};

const requireBook = (db: SqliteDatabase, id: number): Book => toBook(findRow(db, id));

const toIso = (date: Date | null): string | null => (date ? date.toISOString() : null);

const toDate = (value: string | null): Date | null => (value === null ? null : new Date(value));

export const toBook = (row: BookRow): Book => {
  if (!isBookStatus(row.status)) {
    throw new IntegrityError([`book ${row.id} has unknown status "${row.status}"`]);
  }

  return {
    id: row.id,
    title: row.title,
    author: row.author,
    status: row.status,
    dateAdded: new Date(row.date_added),
    dateStarted: toDate(row.date_started),
    dateFinished: toDate(row.date_finished),
    lastModified: new Date(row.last_modified),
  };
};
