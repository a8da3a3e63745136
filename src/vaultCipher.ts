import * as openpgp from 'openpgp';
import { ContainerError } from './errors';
import type { KeyHandle } from './keyMaterial';

/** OpenPGP's own default: 65 MiB hashed per derivation. */
export const DEFAULT_S2K_ITERATION_COUNT_BYTE = 224;

export interface VaultCipherOptions {
  /** Encoded S2K iteration count (0-255); higher is slower to brute-force. */
  s2kIterationCountByte?: number;
}

/**
 * VaultCipher is the cryptography boundary of the app.
 *
 * It wraps OpenPGP.js symmetric (password-based) encryption around a whole
 * database image. The sealed container is a binary OpenPGP message:
 * - a symmetric-key encrypted session key packet (salted, iterated S2K),
 * - a symmetrically encrypted, integrity-protected data packet (AES-256 + MDC).
 *
 * Without the right key the container is just an unreadable OpenPGP message;
 * a single flipped byte anywhere makes `open` fail.
 */
export class VaultCipher {
  private readonly config: Partial<openpgp.Config>;

  constructor(options: VaultCipherOptions = {}) {
    const countByte = options.s2kIterationCountByte ?? DEFAULT_S2K_ITERATION_COUNT_BYTE;
    if (!Number.isInteger(countByte) || countByte < 0 || countByte > 255) {
      throw new RangeError(`s2kIterationCountByte must be an integer in 0..255, got ${countByte}`);
    }

    this.config = {
      preferredSymmetricAlgorithm: openpgp.enums.symmetric.aes256,
      preferredCompressionAlgorithm: openpgp.enums.compression.uncompressed,
      s2kIterationCountByte: countByte,
      aeadProtect: false,
    };
  }

  async seal(image: Uint8Array, key: KeyHandle): Promise<Uint8Array> {
    const password = key.expose();
    const message = await openpgp.createMessage({ binary: image });

    // A fresh session key and S2K salt are generated on every call.
    return openpgp.encrypt({
      message,
      passwords: [password],
      format: 'binary',
      config: this.config,
    });
  }

  async open(container: Uint8Array, key: KeyHandle): Promise<Uint8Array> {
    const password = key.expose();

    try {
      const message = await openpgp.readMessage({ binaryMessage: container });
      const { data } = await openpgp.decrypt({
        message,
        passwords: [password],
        format: 'binary',
        config: this.config,
      });
      return data;
    } catch (error) {
      // Callers cannot tell a wrong key from a modified container.
      throw new ContainerError('Container could not be decrypted', { cause: error });
    }
  }
}
