import fs from 'fs';

/**
 * Diagnostic log, off unless `SHELFVAULT_DEBUG=1`.
 *
 * Only store lifecycle events go here (paths, sizes, timings, error codes).
 * Passphrases, key bytes and book contents are never passed to `logDebug`.
 */
let debugLogPath: string | null = null;

export function configureDebugLog(path: string | null): void {
  debugLogPath = path;
}

export function logDebug(message: string): void {
  if (!debugLogPath) return;

  try {
    const timestamp = new Date().toISOString();
    fs.appendFileSync(debugLogPath, `[${timestamp}] ${message}\n`);
  } catch {
    // Unwritable log location: stop trying for the rest of the process.
    debugLogPath = null;
  }
}
