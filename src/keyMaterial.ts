import { inspect } from 'util';
import { KeyDestroyedError } from './errors';

const REDACTED = '[KeyHandle]';

/**
 * Opaque in-memory key material for one catalog session.
 *
 * The handle carries the normalized passphrase bytes that the vault cipher
 * applies to every seal/open; OpenPGP stretches them with a salted, iterated
 * S2K each time. The bytes never leave the process: every string or JSON
 * rendering of a handle is `[KeyHandle]`, and `destroy()` zero-fills them.
 */
export class KeyHandle {
  private material: Buffer | null;

  private constructor(material: Buffer) {
    this.material = material;
  }

  static fromPassphrase(passphrase: string): KeyHandle {
    // NFC so that composed and decomposed input of the same characters agree.
    return new KeyHandle(Buffer.from(passphrase.normalize('NFC'), 'utf8'));
  }

  get destroyed(): boolean {
    return this.material === null;
  }

  /** Password string handed to OpenPGP. Only the vault cipher calls this. */
  expose(): string {
    if (!this.material) throw new KeyDestroyedError();
    return this.material.toString('utf8');
  }

  destroy(): void {
    if (this.material) {
      this.material.fill(0);
      this.material = null;
    }
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}

/**
 * Turn a passphrase into key material for `EncryptedStore.open`.
 *
 * No strength policy is applied here, and nothing is checked against a file:
 * a wrong passphrase only shows up when the store tries to decrypt.
 */
export const deriveKey = (passphrase: string): KeyHandle => KeyHandle.fromPassphrase(passphrase);
