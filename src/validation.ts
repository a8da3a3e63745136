import { ValidationError } from './errors';
import { err, ok, type Result } from './result';
import { BOOK_STATUSES, type BookFields, type BookStatus } from './types';

interface TextConstraint {
  label: string;
  allowEmpty: boolean;
  maxLength: number;
}

/**
 * Field constraint table for caller-supplied values.
 *
 * Checked by the repository before a transaction is opened; the schema's own
 * CHECK constraints are the last line, not the first.
 */
export const FIELD_CONSTRAINTS = {
  title: { label: 'Title', allowEmpty: false, maxLength: 500 },
  author: { label: 'Author', allowEmpty: true, maxLength: 300 },
} satisfies Record<'title' | 'author', TextConstraint>;

export interface NewBookInput {
  title: string;
  author: string;
  status: BookStatus;
}

export const isBookStatus = (value: unknown): value is BookStatus =>
  BOOK_STATUSES.some((status) => status === value);

const checkText = (field: keyof typeof FIELD_CONSTRAINTS, value: unknown): Result<string, ValidationError> => {
  const constraint: TextConstraint = FIELD_CONSTRAINTS[field];
  if (typeof value !== 'string') {
    return err(new ValidationError(field, `${constraint.label} must be text`));
  }

  const trimmed = value.trim();
  if (!constraint.allowEmpty && trimmed.length === 0) {
    return err(new ValidationError(field, `${constraint.label} cannot be empty`));
  }
  if (trimmed.length > constraint.maxLength) {
    return err(
      new ValidationError(field, `${constraint.label} must be at most ${constraint.maxLength} characters`)
    );
  }
  return ok(trimmed);
};

const checkStatus = (value: unknown): Result<BookStatus, ValidationError> =>
  isBookStatus(value)
    ? ok(value)
    : err(new ValidationError('status', `Status must be one of: ${BOOK_STATUSES.join(', ')}`));

const checkDate = (field: string, value: unknown): Result<Date | null, ValidationError> => {
  if (value === null) return ok(null);
  if (value instanceof Date && !Number.isNaN(value.getTime())) return ok(value);
  return err(new ValidationError(field, `${field} must be a valid date`));
};

export const validateNewBook = (input: NewBookInput): Result<NewBookInput, ValidationError> => {
  const title = checkText('title', input.title);
  if (!title.ok) return title;
  const author = checkText('author', input.author);
  if (!author.ok) return author;
  const status = checkStatus(input.status);
  if (!status.ok) return status;

  return ok({ title: title.value, author: author.value, status: status.value });
};

/** Normalize a partial update. Only the keys present in `fields` are checked. */
export const validateBookFields = (fields: BookFields): Result<BookFields, ValidationError> => {
  const normalized: BookFields = {};

  if (fields.title !== undefined) {
    const title = checkText('title', fields.title);
    if (!title.ok) return title;
    normalized.title = title.value;
  }
  if (fields.author !== undefined) {
    const author = checkText('author', fields.author);
    if (!author.ok) return author;
    normalized.author = author.value;
  }
  if (fields.status !== undefined) {
    const status = checkStatus(fields.status);
    if (!status.ok) return status;
    normalized.status = status.value;
  }
  if (fields.dateStarted !== undefined) {
    const started = checkDate('dateStarted', fields.dateStarted);
    if (!started.ok) return started;
    normalized.dateStarted = started.value;
  }
  if (fields.dateFinished !== undefined) {
    const finished = checkDate('dateFinished', fields.dateFinished);
    if (!finished.ok) return finished;
    normalized.dateFinished = finished.value;
  }

  if (Object.keys(normalized).length === 0) {
    return err(new ValidationError('fields', 'Nothing to update'));
  }
  return ok(normalized);
};

export const validateBookId = (id: number): Result<number, ValidationError> =>
  Number.isSafeInteger(id) && id > 0
    ? ok(id)
    : err(new ValidationError('id', 'Book id must be a positive whole number'));
