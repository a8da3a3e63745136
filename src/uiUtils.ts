import chalk from 'chalk';
import * as clack from '@clack/prompts';
import type { Book, BookStatus } from './types';

/**
 * UI helper utilities.
 *
 * These functions centralize presentation (header, status messages) and
 * formatting (book table, dates), so the `Menu` stays about the flow.
 */
export const displayHeader = () => {
  console.clear();
  console.log(chalk.bold.cyan('\n╔════════════════════════════════════╗'));
  console.log(chalk.bold.cyan('║     shelfvault · encrypted books   ║'));
  console.log(chalk.bold.cyan('╚════════════════════════════════════╝\n'));
};

export const displaySuccess = (message: string) => {
  clack.log.success(chalk.green(message));
};

export const displayError = (message: string) => {
  clack.log.error(chalk.red(message));
};

export const displayInfo = (message: string) => {
  clack.log.info(chalk.blue(message));
};

export const displayWarning = (message: string) => {
  clack.log.warn(chalk.yellow(message));
};

export const truncateText = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
};

/** Calendar date in UTC, e.g. `2026-03-14`. */
export const formatDate = (date: Date | null, fallback = ''): string =>
  date ? date.toISOString().slice(0, 10) : fallback;

const COLUMNS = [
  { header: 'ID', width: 5 },
  { header: 'Title', width: 30 },
  { header: 'Author', width: 20 },
  { header: 'Status', width: 10 },
  { header: 'Started', width: 15 },
  { header: 'Finished', width: 15 },
] as const;

const TABLE_WIDTH = COLUMNS.reduce((sum, column) => sum + column.width + 1, -1);

const formatCells = (cells: readonly string[]): string =>
  cells.map((cell, i) => truncateText(cell, COLUMNS[i].width).padEnd(COLUMNS[i].width)).join(' ').trimEnd();

/** Plain-text table lines (no color), header first. */
export const formatBookTable = (books: readonly Book[]): string[] => [
  formatCells(COLUMNS.map((column) => column.header)),
  '-'.repeat(TABLE_WIDTH),
  ...books.map((book) =>
    formatCells([
      String(book.id),
      book.title,
      book.author,
      book.status,
      formatDate(book.dateStarted, 'Not started'),
      formatDate(book.dateFinished, 'Not finished'),
    ])
  ),
];

const STATUS_COLORS: Record<BookStatus, (text: string) => string> = {
  unread: chalk.white,
  reading: chalk.yellow,
  read: chalk.green,
};

export const displayBooks = (books: readonly Book[], heading = 'Your Library') => {
  if (books.length === 0) {
    displayInfo('No books found!');
    return;
  }

  const [header, rule, ...rows] = formatBookTable(books);
  console.log(chalk.bold(`\n${heading}:`));
  console.log(chalk.bold(header));
  console.log(chalk.dim(rule));
  rows.forEach((row, i) => console.log(STATUS_COLORS[books[i].status](row)));
  console.log();
};

/** Parse a typed book id; `null` for anything but a positive whole number. */
export const parseBookId = (input: string): number | null => {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
};

/** Parse a `YYYY-MM-DD` or full ISO timestamp; `null` when it is not a real date. */
export const parseDateInput = (input: string): Date | null => {
  const trimmed = input.trim();
  if (!/^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?Z?)?$/.test(trimmed)) return null;
  const utc = trimmed.length === 10 || trimmed.endsWith('Z');
  const date = new Date(trimmed.length === 10 ? `${trimmed}T00:00:00Z` : trimmed.replace(' ', 'T'));
  if (Number.isNaN(date.getTime())) return null;

  // Date rolls 2026-02-30 over to 2026-03-02; the calendar part must survive parsing unchanged.
  const parsed = utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate()];
  const typed = trimmed.slice(0, 10).split('-').map(Number);
  return parsed.every((part, i) => part === typed[i]) ? date : null;
};
