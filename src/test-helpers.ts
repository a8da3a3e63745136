/**
 * Shared fixtures for the test suites. Not used by the app itself.
 */
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { SqliteDatabase } from './encryptedStore';
import { deriveKey, type KeyHandle } from './keyMaterial';
import { VaultCipher } from './vaultCipher';

export const TEST_PASSPHRASE = 'test-secret';

/** Cheap S2K so every commit in a test does not hash 65 MiB. */
export const fastCipher = (): VaultCipher => new VaultCipher({ s2kIterationCountByte: 96 });

/** A cipher whose next seal can be made to fail, standing in for a full disk. */
export class FlakyCipher extends VaultCipher {
  failNextSeal = false;

  constructor() {
    super({ s2kIterationCountByte: 96 });
  }

  override async seal(image: Uint8Array, key: KeyHandle): Promise<Uint8Array> {
    if (this.failNextSeal) {
      this.failNextSeal = false;
      throw new Error('ENOSPC: no space left on device');
    }
    return super.seal(image, key);
  }
}

export const makeTempDir = (): string => mkdtempSync(join(tmpdir(), 'shelfvault-'));

export const removeTempDir = (dir: string): void => {
  rmSync(dir, { recursive: true, force: true });
};

/** Serialize a throwaway in-memory database prepared by `setup`. */
export const buildImage = (setup: (db: SqliteDatabase) => void): Buffer => {
  const db = new Database(':memory:');
  try {
    setup(db);
    return db.serialize();
  } finally {
    db.close();
  }
};

/** Write `image` to `path` as a container sealed with `passphrase`. */
export const writeSealedImage = async (
  path: string,
  image: Uint8Array,
  passphrase: string = TEST_PASSPHRASE
): Promise<void> => {
  const key = deriveKey(passphrase);
  try {
    writeFileSync(path, await fastCipher().seal(image, key));
  } finally {
    key.destroy();
  }
};
