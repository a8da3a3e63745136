import { join, resolve } from 'path';
import { homedir } from 'os';
import type { Config } from './types';
import { DEFAULT_S2K_ITERATION_COUNT_BYTE } from './vaultCipher';

export const DEFAULT_DATABASE_FILE = 'books.db';

export interface ConfigOverrides {
  /** `--db` flag; wins over the environment. */
  databasePath?: string;
}

/**
 * Compute the application configuration.
 *
 * Layout follows the XDG convention: `~/.config/shelfvault/` holds the debug
 * log. The catalog itself defaults to `books.db` in the working directory.
 * Precedence for the catalog path: flag, then `SHELFVAULT_DB`, then the default.
 */
export const getConfig = (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Config => {
  const configDir = join(homedir(), '.config', 'shelfvault');
  const databasePath = resolve(overrides.databasePath ?? env.SHELFVAULT_DB ?? DEFAULT_DATABASE_FILE);

  return {
    configDir,
    databasePath,
    debug: env.SHELFVAULT_DEBUG === '1',
    debugLogPath: join(configDir, 'debug.log'),
    s2kIterationCountByte: parseCountByte(env.SHELFVAULT_S2K_COUNT_BYTE),
  };
};

const parseCountByte = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === '') return DEFAULT_S2K_ITERATION_COUNT_BYTE;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`SHELFVAULT_S2K_COUNT_BYTE must be an integer in 0..255, got "${raw}"`);
  }
  return value;
};

/**
 * Ensure the app's on-disk directories exist.
 *
 * Only needed when debug logging is on; the catalog's own directory is the
 * user's choice and is not created here.
 */
export const ensureConfigDirs = async (config: Config): Promise<void> => {
  const fs = await import('fs/promises');

  try {
    // `recursive: true` makes this idempotent.
    await fs.mkdir(config.configDir, { recursive: true });
  } catch (error) {
    console.error('Failed to create configuration directory:', error);
    throw error;
  }
};
