import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { applyEdit, BookRepository } from './bookRepository';
import { EncryptedStore } from './encryptedStore';
import { NotFoundError, StoreNotVerifiedError, TransactionFailedError, ValidationError } from './errors';
import { deriveKey } from './keyMaterial';
import { unwrap } from './result';
import { openSession, type Session } from './session';
import { fastCipher, FlakyCipher, makeTempDir, removeTempDir, TEST_PASSPHRASE } from './test-helpers';
import type { Book, ListFilter } from './types';

const T0 = new Date('2026-03-01T09:00:00.000Z');
const T1 = new Date('2026-03-05T18:30:00.000Z');
const T2 = new Date('2026-03-09T07:15:00.000Z');

describe('BookRepository', () => {
  let dir: string;
  let path: string;
  let clock: Date;
  let session: Session;
  let books: BookRepository;

  const start = async (cipher = fastCipher()) => {
    session = await openSession({ path, passphrase: TEST_PASSPHRASE, cipher, now: () => clock });
    books = session.books;
  };

  beforeEach(async () => {
    dir = makeTempDir();
    path = join(dir, 'books.db');
    clock = T0;
    await start();
  });

  afterEach(async () => {
    await session.close();
    removeTempDir(dir);
  });

  it('refuses a store that has not passed its integrity check', async () => {
    await session.close();
    const store = await EncryptedStore.open(path, deriveKey(TEST_PASSPHRASE), { cipher: fastCipher() });
    try {
      expect(() => new BookRepository(store)).toThrow(StoreNotVerifiedError);
    } finally {
      await store.close();
    }
  });

  describe('add', () => {
    it('creates an unread book with a fresh id', async () => {
      const book = unwrap(await books.add('Dune', 'Frank Herbert'));

      expect(book).toEqual({
        id: 1,
        title: 'Dune',
        author: 'Frank Herbert',
        status: 'unread',
        dateAdded: T0,
        dateStarted: null,
        dateFinished: null,
        lastModified: T0,
      });
    });

    it('trims text and accepts an unknown author', async () => {
      const book = unwrap(await books.add('  Beowulf  ', ''));
      expect(book.title).toBe('Beowulf');
      expect(book.author).toBe('');
    });

    it('stamps start and finish dates for a book added as read', async () => {
      const book = unwrap(await books.add('Emma', 'Jane Austen', 'read'));
      expect(book.dateStarted).toEqual(T0);
      expect(book.dateFinished).toEqual(T0);
    });

    it('rejects an empty title without touching the catalog', async () => {
      const result = await books.add('   ', 'Nobody');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error).toMatchObject({ field: 'title', message: 'Title cannot be empty' });
      expect(books.list().toArray()).toEqual([]);
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      unwrap(await books.add('Dune', 'Frank Herbert'));
      unwrap(await books.add('Emma', 'Jane Austen', 'reading'));
      unwrap(await books.add('beowulf', '', 'read'));
    });

    it('orders by id by default', () => {
      expect(books.list().toArray().map((book) => book.id)).toEqual([1, 2, 3]);
    });

    it('filters by status', () => {
      expect(books.list({ status: 'reading' }).toArray().map((book) => book.title)).toEqual(['Emma']);
    });

    it('sorts by title without regard to case', () => {
      const titles = books.list({ orderBy: 'title', direction: 'desc' }).toArray().map((book) => book.title);
      expect(titles).toEqual(['Emma', 'Dune', 'beowulf']);
    });

    it('re-reads the catalog on every iteration', async () => {
      const listing = books.list();
      expect([...listing]).toHaveLength(3);

      unwrap(await books.add('Ulysses', 'James Joyce'));

      expect([...listing].map((book) => book.title)).toEqual(['Dune', 'Emma', 'beowulf', 'Ulysses']);
    });

    it('lets each listed book be changed while iterating', async () => {
      const marked: boolean[] = [];
      for (const book of books.list({ status: 'unread' })) {
        marked.push((await books.markRead(book.id)).ok);
      }

      expect(marked).toEqual([true]);
      expect(books.list({ status: 'read' }).toArray().map((book) => book.title)).toEqual(['Dune', 'beowulf']);
    });

    it('rejects an unknown status filter', () => {
      const filter: ListFilter = {};
      Object.assign(filter, { status: 'abandoned' });
      expect(() => books.list(filter)).toThrow('Unknown status filter: abandoned');
    });
  });

  describe('edit', () => {
    let book: Book;

    beforeEach(async () => {
      book = unwrap(await books.add('Dune', 'Frank Herbert'));
      clock = T1;
    });

    it('applies a partial update and keeps the other fields', async () => {
      const edited = unwrap(await books.edit(book.id, { author: 'F. Herbert' }));

      expect(edited).toEqual({ ...book, author: 'F. Herbert', lastModified: T1 });
    });

    it('sets the finish date when the status becomes read', async () => {
      const edited = unwrap(await books.edit(book.id, { status: 'read' }));

      expect(edited.status).toBe('read');
      expect(edited.dateStarted).toEqual(T1);
      expect(edited.dateFinished).toEqual(T1);
    });

    it('clears the finish date when the status leaves read', async () => {
      unwrap(await books.edit(book.id, { status: 'read' }));
      clock = T2;

      const edited = unwrap(await books.edit(book.id, { status: 'reading' }));

      expect(edited.dateFinished).toBeNull();
      expect(edited.dateStarted).toEqual(T1);
    });

    it('accepts explicit reading dates', async () => {
      const edited = unwrap(
        await books.edit(book.id, { status: 'read', dateStarted: T0, dateFinished: T1 })
      );
      expect(edited.dateStarted).toEqual(T0);
      expect(edited.dateFinished).toEqual(T1);
    });

    it('rejects a finish date on a book that is not read', async () => {
      const result = await books.edit(book.id, { dateFinished: T1 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'dateFinished' });
      expect(books.list().toArray()[0]).toEqual(book);
    });

    it('rejects an empty update', async () => {
      const result = await books.edit(book.id, {});
      expect(result.ok ? null : result.error).toMatchObject({ field: 'fields', message: 'Nothing to update' });
    });

    it('reports a missing id as NotFound', async () => {
      const result = await books.edit(42, { title: 'Emma' });
      expect(result.ok ? null : result.error).toBeInstanceOf(NotFoundError);
    });

    it('rejects ids that are not positive whole numbers', async () => {
      const result = await books.edit(0, { title: 'Emma' });
      expect(result.ok ? null : result.error).toMatchObject({ field: 'id' });
    });
  });

  describe('markRead', () => {
    it('sets status and finish date on the first call only', async () => {
      const book = unwrap(await books.add('Dune', 'Frank Herbert'));

      clock = T1;
      const first = unwrap(await books.markRead(book.id));
      clock = T2;
      const second = unwrap(await books.markRead(book.id));

      expect(first.status).toBe('read');
      expect(first.dateFinished).toEqual(T1);
      expect(second.dateFinished).toEqual(T1);
      expect(second.lastModified).toEqual(T1);
    });

    it('keeps an existing start date', async () => {
      const book = unwrap(await books.add('Emma', 'Jane Austen', 'reading'));
      clock = T2;

      const read = unwrap(await books.markRead(book.id));

      expect(read.dateStarted).toEqual(T0);
      expect(read.dateFinished).toEqual(T2);
    });

    it('reports a missing id as NotFound', async () => {
      const result = await books.markRead(7);
      expect(result.ok ? null : result.error).toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('removes the book for good and never reuses its id', async () => {
      const book = unwrap(await books.add('Dune', 'Frank Herbert'));

      expect((await books.delete(book.id)).ok).toBe(true);

      for (const result of [
        await books.edit(book.id, { title: 'Dune Messiah' }),
        await books.markRead(book.id),
        await books.delete(book.id),
      ]) {
        expect(result.ok ? null : result.error).toBeInstanceOf(NotFoundError);
      }

      const next = unwrap(await books.add('Emma', 'Jane Austen'));
      expect(next.id).toBe(2);
    });

    it('keeps ids unique across sessions', async () => {
      unwrap(await books.add('Dune', 'Frank Herbert'));
      unwrap(await books.delete(1));
      await session.close();

      await start();
      expect(unwrap(await books.add('Emma', 'Jane Austen')).id).toBe(2);
    });
  });

  it('walks through add, read and delete', async () => {
    unwrap(await books.add('Dune', 'Herbert'));
    let listing = books.list().toArray();
    expect(listing).toHaveLength(1);
    expect(listing[0].status).toBe('unread');

    clock = T1;
    unwrap(await books.markRead(1));
    listing = books.list().toArray();
    expect(listing[0].status).toBe('read');
    expect(listing[0].dateFinished).toEqual(T1);

    unwrap(await books.delete(1));
    expect(books.list().toArray()).toEqual([]);
  });

  it('persists books across sessions', async () => {
    const book = unwrap(await books.add('Dune', 'Frank Herbert', 'reading'));
    await session.close();

    await start();
    expect(books.list().toArray()).toEqual([book]);
  });

  it('leaves no trace of a transaction body that throws', async () => {
    unwrap(await books.add('Dune', 'Frank Herbert'));

    await expect(
      session.store.transaction((db) => {
        db.prepare("UPDATE books SET title = 'Changed'").run();
        db.prepare('DELETE FROM books').run();
        throw new Error('interrupted');
      })
    ).rejects.toThrow('interrupted');

    expect(books.list().toArray().map((book) => book.title)).toEqual(['Dune']);
  });

  it('returns TransactionFailed when the catalog cannot be saved', async () => {
    await session.close();
    const cipher = new FlakyCipher();
    await start(cipher);

    cipher.failNextSeal = true;
    const result = await books.add('Dune', 'Frank Herbert');

    expect(result.ok ? null : result.error).toBeInstanceOf(TransactionFailedError);
    expect(books.list().toArray()).toEqual([]);
    expect(unwrap(await books.add('Dune', 'Frank Herbert')).id).toBe(1);
  });
});

describe('applyEdit', () => {
  const reading: Book = {
    id: 3,
    title: 'Middlemarch',
    author: 'George Eliot',
    status: 'reading',
    dateAdded: T0,
    dateStarted: T0,
    dateFinished: null,
    lastModified: T0,
  };

  it('keeps the finish date of a read book when the status does not change', () => {
    const read = { ...reading, status: 'read' as const, dateFinished: T1 };
    expect(applyEdit(read, { title: 'Middlemarch (annotated)' }, T2).dateFinished).toEqual(T1);
  });

  it('refuses to clear the finish date of a read book', () => {
    const read = { ...reading, status: 'read' as const, dateFinished: T1 };
    expect(() => applyEdit(read, { dateFinished: null }, T2)).toThrow(ValidationError);
  });

  it('refuses a start date after the finish date', () => {
    expect(() => applyEdit(reading, { status: 'read', dateStarted: T2, dateFinished: T1 }, T2)).toThrow(
      'Start date cannot be after the finish date'
    );
  });

  it('leaves the start date alone when moving back to unread', () => {
    const edited = applyEdit(reading, { status: 'unread' }, T1);
    expect(edited.dateStarted).toEqual(T0);
    expect(edited.dateFinished).toBeNull();
    expect(edited.lastModified).toEqual(T1);
  });
});
