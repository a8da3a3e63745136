import type { EventEmitter } from 'events';
import { BookRepository } from './bookRepository';
import { EncryptedStore } from './encryptedStore';
import { IntegrityError, errorMessage } from './errors';
import { deriveKey } from './keyMaterial';
import { logDebug } from './logger';
import type { CloseReport } from './types';
import type { VaultCipher } from './vaultCipher';

export interface SessionOptions {
  path: string;
  passphrase: string;
  cipher?: VaultCipher;
  now?: () => Date;
}

export interface Session {
  store: EncryptedStore;
  books: BookRepository;
  close(): Promise<CloseReport>;
}

/**
 * Derive the key, open the catalog and verify it.
 *
 * Throws `OpenFailedError` or `IntegrityError`, both fatal for the caller.
 * On a corrupted catalog the store is closed before throwing.
 */
export async function openSession(options: SessionOptions): Promise<Session> {
  const key = deriveKey(options.passphrase);

  let store: EncryptedStore;
  try {
    store = await EncryptedStore.open(options.path, key, { cipher: options.cipher });
  } catch (error) {
    key.destroy();
    throw error;
  }

  const report = store.verifyIntegrity();
  if (report.status === 'corrupted') {
    await store.close();
    throw new IntegrityError(report.details);
  }

  return {
    store,
    books: new BookRepository(store, { now: options.now }),
    close: () => store.close(),
  };
}

const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;
type HandledSignal = keyof typeof SIGNAL_EXIT_CODES;

export interface ScopeOptions {
  /** Where termination signals come from; the process by default. */
  signals?: EventEmitter;
  exit?: (code: number) => void;
}

/**
 * Run `body` with an open session and release it on every exit path.
 *
 * Normal return and thrown errors close the store in `finally`. SIGINT and
 * SIGTERM close it, then exit with 128 + signal number.
 */
export async function withSession<T>(
  options: SessionOptions,
  body: (session: Session) => Promise<T>,
  scope: ScopeOptions = {}
): Promise<T> {
  const signals = scope.signals ?? process;
  const exit = scope.exit ?? ((code: number) => process.exit(code));
  const session = await openSession(options);

  const onSignal = (signal: HandledSignal) => {
    logDebug(`[session] ${signal} received, closing catalog`);
    void session.close().then(
      () => exit(SIGNAL_EXIT_CODES[signal]),
      (error: unknown) => {
        logDebug(`[session] close after ${signal} failed: ${errorMessage(error)}`);
        exit(1);
      }
    );
  };
  const onInterrupt = () => onSignal('SIGINT');
  const onTerminate = () => onSignal('SIGTERM');

  signals.once('SIGINT', onInterrupt);
  signals.once('SIGTERM', onTerminate);

  try {
    return await body(session);
  } finally {
    signals.off('SIGINT', onInterrupt);
    signals.off('SIGTERM', onTerminate);
    await session.close();
  }
}
