/**
 * Structured error classes.
 *
 * Two kinds are fatal for a session (`OpenFailedError`, `IntegrityError`): the
 * catalog cannot be trusted and the process exits. The rest are reported to the
 * user and the command loop continues.
 */

export abstract class AppError extends Error {
  abstract readonly code: string;
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

export type OpenFailureReason = 'wrong-key-or-tampered' | 'not-a-database' | 'io' | 'already-open';

/**
 * The catalog file could not be opened: wrong passphrase, tampered container,
 * unreadable file. A wrong passphrase and a damaged container look the same here.
 */
export class OpenFailedError extends AppError {
  readonly code = 'OPEN_FAILED' as const;
  readonly path: string;
  readonly reason: OpenFailureReason;

  constructor(path: string, reason: OpenFailureReason, options?: { cause?: unknown }) {
    super(describeOpenFailure(path, reason), options);
    this.path = path;
    this.reason = reason;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, reason: this.reason };
  }
}

function describeOpenFailure(path: string, reason: OpenFailureReason): string {
  switch (reason) {
    case 'wrong-key-or-tampered':
      return `Cannot open ${path}: incorrect passphrase or the file has been modified`;
    case 'not-a-database':
      return `Cannot open ${path}: the decrypted contents are not a catalog database`;
    case 'io':
      return `Cannot open ${path}: the file could not be read or written`;
    case 'already-open':
      return `Cannot open ${path}: the catalog is already open in this process`;
  }
}

/** The integrity check found damage after a successful open. */
export class IntegrityError extends AppError {
  readonly code = 'INTEGRITY_FAILED' as const;
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super(`Catalog integrity check failed: ${details[0] ?? 'unknown damage'}`);
    this.details = details;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details };
  }
}

/** Caller-supplied data violates a field constraint. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field };
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly id: number;

  constructor(id: number) {
    super(`Book not found: ${id}`);
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id };
  }
}

/** A transaction was rolled back because the engine or the disk failed. Retryable. */
export class TransactionFailedError extends AppError {
  readonly code = 'TRANSACTION_FAILED' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The container could not be parsed or decrypted with the given key. */
export class ContainerError extends AppError {
  readonly code = 'CONTAINER_UNREADABLE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StoreClosedError extends AppError {
  readonly code = 'STORE_CLOSED' as const;

  constructor() {
    super('The catalog store is closed');
  }
}

export class StoreNotVerifiedError extends AppError {
  readonly code = 'STORE_NOT_VERIFIED' as const;

  constructor(state: string) {
    super(`The catalog store must pass its integrity check first (state: ${state})`);
  }
}

export class KeyDestroyedError extends AppError {
  readonly code = 'KEY_DESTROYED' as const;

  constructor() {
    super('Key material has been released');
  }
}

export type CatalogError = ValidationError | NotFoundError | TransactionFailedError;

export const isFatalError = (error: unknown): error is OpenFailedError | IntegrityError =>
  error instanceof OpenFailedError || error instanceof IntegrityError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
