/**
 * Central type definitions for the app.
 *
 * These types document the shape of the data passed between the menu, the
 * repository and the encrypted store.
 */

/** Reading status of a catalog entry. */
export type BookStatus = 'unread' | 'reading' | 'read';

export const BOOK_STATUSES: readonly BookStatus[] = ['unread', 'reading', 'read'];

/** Runtime representation of a book (Date objects for sorting/formatting). */
export interface Book {
  /** Surrogate id assigned by the store; never reused within a file. */
  id: number;
  title: string;
  /** May be empty when the author is unknown. */
  author: string;
  status: BookStatus;
  dateAdded: Date;
  /** First time the book moved to `reading` or `read`. */
  dateStarted: Date | null;
  /** Set if and only if `status` is `read`. */
  dateFinished: Date | null;
  lastModified: Date;
}

/** On-disk row shape of the `books` table (ISO-8601 text timestamps). */
export interface BookRow {
  id: number;
  title: string;
  author: string;
  status: string;
  date_added: string;
  date_started: string | null;
  date_finished: string | null;
  last_modified: string;
}

/** Partial update accepted by `BookRepository.edit`. `dateAdded` is deliberately absent. */
export interface BookFields {
  title?: string;
  author?: string;
  status?: BookStatus;
  dateStarted?: Date | null;
  dateFinished?: Date | null;
}

export type BookOrderField = 'id' | 'title' | 'author' | 'dateAdded' | 'dateFinished';

export type SortDirection = 'asc' | 'desc';

export interface ListFilter {
  status?: BookStatus;
  orderBy?: BookOrderField;
  direction?: SortDirection;
}

/** Outcome of `EncryptedStore.verifyIntegrity`. */
export type IntegrityReport =
  | { status: 'ok' }
  | { status: 'corrupted'; details: string[] };

export type IntegrityState = 'unchecked' | IntegrityReport['status'];

/** Summary returned when a store is closed. */
export interface CloseReport {
  /** SHA-256 of the container when it was opened (empty for a file created by this session). */
  initialDigest: string;
  finalDigest: string;
  changed: boolean;
}

export interface Config {
  /** Directory holding the debug log (`~/.config/shelfvault`). */
  configDir: string;
  /** Path of the encrypted catalog file. */
  databasePath: string;
  /** Whether `logDebug` writes to `debugLogPath`. */
  debug: boolean;
  debugLogPath: string;
  /** OpenPGP S2K iteration count byte used when sealing the catalog. */
  s2kIterationCountByte: number;
}
