import { describe, expect, it } from 'vitest';
import type { Book } from './types';
import { formatBookTable, formatDate, parseBookId, parseDateInput, truncateText } from './uiUtils';

const book = (overrides: Partial<Book>): Book => ({
  id: 1,
  title: 'Dune',
  author: 'Frank Herbert',
  status: 'unread',
  dateAdded: new Date('2026-03-01T09:00:00Z'),
  dateStarted: null,
  dateFinished: null,
  lastModified: new Date('2026-03-01T09:00:00Z'),
  ...overrides,
});

describe('truncateText', () => {
  it('keeps short text and shortens long text with an ellipsis', () => {
    expect(truncateText('Dune', 10)).toBe('Dune');
    expect(truncateText('The Left Hand of Darkness', 10)).toBe('The Lef...');
  });
});

describe('formatDate', () => {
  it('prints the UTC calendar date or the fallback', () => {
    expect(formatDate(new Date('2026-03-14T23:59:00Z'))).toBe('2026-03-14');
    expect(formatDate(null, 'Not started')).toBe('Not started');
  });
});

describe('formatBookTable', () => {
  it('lays out a header, a rule and one line per book', () => {
    const lines = formatBookTable([
      book({}),
      book({
        id: 12,
        title: 'A'.repeat(40),
        status: 'read',
        dateStarted: new Date('2026-03-02T10:00:00Z'),
        dateFinished: new Date('2026-03-05T10:00:00Z'),
      }),
    ]);

    expect(lines).toEqual([
      'ID    Title                          Author               Status     Started         Finished',
      '-'.repeat(100),
      '1     Dune                           Frank Herbert        unread     Not started     Not finished',
      `12    ${'A'.repeat(27)}... Frank Herbert        read       2026-03-02      2026-03-05`,
    ]);
  });

  it('prints only the header and rule for an empty catalog', () => {
    expect(formatBookTable([])).toHaveLength(2);
  });
});

describe('parseBookId', () => {
  it('accepts positive whole numbers', () => {
    expect(parseBookId(' 12 ')).toBe(12);
  });

  it.each(['0', '-3', '1.5', '', 'abc', '99999999999999999999'])('rejects %j', (input) => {
    expect(parseBookId(input)).toBeNull();
  });
});

describe('parseDateInput', () => {
  it('reads a calendar date as UTC midnight', () => {
    expect(parseDateInput('2026-03-14')).toEqual(new Date('2026-03-14T00:00:00.000Z'));
  });

  it('accepts the last day of a leap-year February', () => {
    expect(parseDateInput('2028-02-29')).toEqual(new Date('2028-02-29T00:00:00.000Z'));
  });

  it('reads a full timestamp', () => {
    expect(parseDateInput('2026-03-14T10:30:00Z')).toEqual(new Date('2026-03-14T10:30:00.000Z'));
  });

  it.each(['yesterday', '14/03/2026', '2026-13-01', '2026-02-30', '2026-04-31T08:00:00Z'])('rejects %j', (input) => {
    expect(parseDateInput(input)).toBeNull();
  });
});
