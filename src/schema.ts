/**
 * The catalog's single, fixed schema.
 *
 * `AUTOINCREMENT` keeps ids from being reused after a delete (SQLite tracks the
 * high-water mark in `sqlite_sequence`). The table-level CHECK ties
 * `date_finished` to the `read` status.
 */
export const BOOKS_TABLE = 'books';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(trim(title)) > 0),
    author TEXT NOT NULL DEFAULT '',
    status TEXT NOT NULL DEFAULT 'unread' CHECK (status IN ('unread', 'reading', 'read')),
    date_added TEXT NOT NULL,
    date_started TEXT,
    date_finished TEXT,
    last_modified TEXT NOT NULL,
    CHECK ((status = 'read') = (date_finished IS NOT NULL))
  );

  CREATE INDEX IF NOT EXISTS books_status_idx ON books (status);
`;

/** Column names `verifyIntegrity` expects to find, in declaration order. */
export const EXPECTED_BOOK_COLUMNS: readonly string[] = [
  'id',
  'title',
  'author',
  'status',
  'date_added',
  'date_started',
  'date_finished',
  'last_modified',
];

export const BOOK_COLUMNS_SQL = EXPECTED_BOOK_COLUMNS.join(', ');
