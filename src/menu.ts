import * as clack from '@clack/prompts';
import chalk from 'chalk';
import type { BookRepository } from './bookRepository';
import type { CatalogError } from './errors';
import { errorMessage } from './errors';
import type { Result } from './result';
import { isBookStatus } from './validation';
import { BOOK_STATUSES, type Book, type BookFields, type BookStatus } from './types';
import {
  displayBooks,
  displayError,
  displayHeader,
  displayInfo,
  displaySuccess,
  displayWarning,
  formatDate,
  parseBookId,
  parseDateInput,
} from './uiUtils';

/**
 * Menu is the command loop of the app.
 *
 * It only collects field values and renders results; every catalog change goes
 * through the five `BookRepository` operations. Per-operation failures are
 * printed and the loop carries on.
 */
export class Menu {
  constructor(private books: BookRepository) {}

  async show(): Promise<void> {
    let running = true;

    while (running) {
      displayHeader();

      const action = await clack.select({
        message: 'What would you like to do?',
        options: [
          { value: 'add', label: '➕ Add a book' },
          { value: 'list', label: '📚 List books' },
          { value: 'edit', label: '✏️  Edit a book' },
          { value: 'read', label: '✅ Mark a book as read' },
          { value: 'delete', label: '🗑️  Delete a book' },
          { value: 'quit', label: '👋 Quit' },
        ],
      });

      // Esc/Ctrl+C at the top level means quit.
      if (clack.isCancel(action) || action === 'quit') {
        running = false;
        clack.outro(chalk.cyan('Goodbye!'));
        continue;
      }

      switch (action) {
        case 'add':
          await this.addBook();
          break;
        case 'list':
          await this.listBooks();
          break;
        case 'edit':
          await this.editBook();
          break;
        case 'read':
          await this.markRead();
          break;
        case 'delete':
          await this.deleteBook();
          break;
      }

      await clack.text({
        message: 'Press Enter to continue...',
        placeholder: '',
      });
    }
  }

  private async addBook(): Promise<void> {
    clack.intro(chalk.bold('Add Book'));

    const title = await clack.text({
      message: 'Enter book title:',
      placeholder: 'Dune',
      validate: (value) => {
        if (!value || !value.trim()) return 'Title is required';
      },
    });
    if (clack.isCancel(title)) return;

    const author = await clack.text({
      message: 'Enter author (optional):',
      placeholder: 'Frank Herbert',
      defaultValue: '',
    });
    if (clack.isCancel(author)) return;

    const status = await this.promptStatus('Reading status:', 'unread');
    if (status === null) return;

    this.report(await this.books.add(title, author, status), (book) => `Added '${book.title}' to your library (id ${book.id})!`);
  }

  private async listBooks(): Promise<void> {
    const filter = await clack.select({
      message: 'Which books?',
      options: [
        { value: 'all', label: 'All books' },
        ...BOOK_STATUSES.map((status) => ({ value: status, label: capitalize(status) })),
      ],
    });
    if (clack.isCancel(filter)) return;

    const listing = this.books.list(isBookStatus(filter) ? { status: filter } : {});
    displayBooks(listing.toArray());
  }

  private async editBook(): Promise<void> {
    clack.intro(chalk.bold('Edit Book'));

    // Show the catalog first so the user can pick an id from it.
    const all = this.books.list().toArray();
    displayBooks(all);
    if (all.length === 0) return;

    const book = await this.promptBook(all, 'Enter book ID to edit:');
    if (!book) return;

    // Collect only the fields the user actually changed; blank input keeps the current value.
    const fields: BookFields = {};

    const title = await clack.text({
      message: 'New title (Enter to keep):',
      placeholder: book.title,
      defaultValue: '',
    });
    if (clack.isCancel(title)) return;
    if (title.trim()) fields.title = title;

    const author = await clack.text({
      message: 'New author (Enter to keep, "-" to clear):',
      placeholder: book.author || '(none)',
      defaultValue: '',
    });
    if (clack.isCancel(author)) return;
    if (author.trim() === '-') fields.author = '';
    else if (author.trim()) fields.author = author;

    const status = await this.promptStatus('Status:', book.status);
    if (status === null) return;
    if (status !== book.status) fields.status = status;

    const started = await this.promptDate('Started reading (YYYY-MM-DD, Enter to keep):', book.dateStarted);
    if (started === undefined) return;
    if (started !== null) fields.dateStarted = started;

    // A finish date only makes sense for a book that ends up read.
    if ((fields.status ?? book.status) === 'read') {
      const finished = await this.promptDate('Finished reading (YYYY-MM-DD, Enter to keep):', book.dateFinished);
      if (finished === undefined) return;
      if (finished !== null) fields.dateFinished = finished;
    }

    if (Object.keys(fields).length === 0) {
      displayInfo('Nothing changed.');
      return;
    }

    this.report(await this.books.edit(book.id, fields), () => 'Book updated successfully!');
  }

  private async markRead(): Promise<void> {
    clack.intro(chalk.bold('Mark as Read'));

    const unread = this.books.list({ status: 'unread' }).toArray();
    const reading = this.books.list({ status: 'reading' }).toArray();
    // Books in progress first, then unread ones.
    const candidates = [...reading, ...unread];
    displayBooks(candidates, 'Not yet read');
    if (candidates.length === 0) return;

    const book = await this.promptBook(candidates, 'Enter book ID to mark as read:');
    if (!book) return;

    this.report(await this.books.markRead(book.id), (updated) => `'${updated.title}' marked as read!`);
  }

  private async deleteBook(): Promise<void> {
    clack.intro(chalk.bold('Delete Book'));

    const all = this.books.list().toArray();
    displayBooks(all);
    if (all.length === 0) return;

    const book = await this.promptBook(all, 'Enter book ID to delete:');
    if (!book) return;

    // Confirm before a permanent delete.
    const confirmed = await clack.confirm({
      message: `Delete '${book.title}' permanently?`,
      initialValue: false,
    });
    if (clack.isCancel(confirmed) || !confirmed) {
      displayInfo('Delete cancelled.');
      return;
    }

    this.report(await this.books.delete(book.id), () => 'Book deleted successfully!');
  }

  private async promptBook(candidates: readonly Book[], message: string): Promise<Book | null> {
    const input = await clack.text({
      message,
      validate: (value) => {
        if (parseBookId(value) === null) return 'Enter a numeric book ID';
      },
    });
    if (clack.isCancel(input)) return null;

    const id = parseBookId(input);
    const book = candidates.find((candidate) => candidate.id === id);
    if (!book) {
      displayError('Book not found!');
      return null;
    }
    return book;
  }

  private async promptStatus(message: string, initialValue: BookStatus): Promise<BookStatus | null> {
    const status = await clack.select({
      message,
      initialValue,
      options: BOOK_STATUSES.map((value) => ({ value, label: capitalize(value) })),
    });
    return isBookStatus(status) ? status : null;
  }

  /** `undefined` on cancel, `null` when left blank. */
  private async promptDate(message: string, current: Date | null): Promise<Date | null | undefined> {
    const input = await clack.text({
      message,
      placeholder: formatDate(current, 'not set'),
      defaultValue: '',
      validate: (value) => {
        if (value.trim() && parseDateInput(value) === null) return 'Use YYYY-MM-DD';
      },
    });
    if (clack.isCancel(input)) return undefined;
    return input.trim() ? parseDateInput(input) : null;
  }

  private report<T>(result: Result<T, CatalogError>, describe: (value: T) => string): void {
    if (result.ok) {
      displaySuccess(describe(result.value));
      return;
    }

    const { error } = result;
    switch (error.code) {
      case 'VALIDATION_ERROR':
        displayWarning(error.message);
        break;
      case 'NOT_FOUND':
        displayError('Book not found!');
        break;
      case 'TRANSACTION_FAILED':
        displayError(`${error.message}. Please try again.`);
        break;
      default:
        displayError(`Error: ${errorMessage(error)}`);
    }
  }
}

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);
